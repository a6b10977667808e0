export type ClientErrorCode =
  | "INVALID_AUTHORIZATION_ARTIFACT"
  | "AUTHENTICATION_REJECTED"
  | "AUTHENTICATION_IN_PROGRESS"
  | "TOKEN_EXPIRED"
  | "NOT_AUTHENTICATED"
  | "SOLVER_EXHAUSTED"
  | "SOLVER_UNSUPPORTED_CHALLENGE"
  | "SOLVER_DELEGATION_FAILED"
  | "CHALLENGE_UNRESOLVED"
  | "TRANSIENT_REQUEST_ERROR"
  | "SIGNING_CONFIGURATION_ERROR"
  | "RATE_LIMITED"
  | "API_REQUEST_FAILED"
  | "VALIDATION_ERROR";

/** Pipeline stage a failure was raised from. */
export type ErrorStage = "signing" | "sending" | "challenge" | "auth" | "validation";

export interface ClientErrorDetails {
  status?: number;
  resultCode?: string;
  retryAfterMs?: number;
  iterations?: number;
  scope?: string;
  [key: string]: unknown;
}
