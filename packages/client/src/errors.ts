import type { ClientErrorCode, ClientErrorDetails, ErrorStage } from "@paybridge/types";

export class PayClientError extends Error {
  public readonly code: ClientErrorCode;
  public readonly stage: ErrorStage;
  public readonly details?: ClientErrorDetails;

  constructor(
    code: ClientErrorCode,
    stage: ErrorStage,
    message: string,
    details?: ClientErrorDetails,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.stage = stage;
    this.details = details;
  }

  get status(): number | undefined {
    return this.details?.status;
  }
}

export class InvalidAuthorizationArtifactError extends PayClientError {
  constructor(message: string) {
    super("INVALID_AUTHORIZATION_ARTIFACT", "auth", message);
  }
}

export class AuthenticationRejectedError extends PayClientError {
  constructor(message: string, details?: ClientErrorDetails, options?: { cause?: unknown }) {
    super("AUTHENTICATION_REJECTED", "auth", message, details, options);
  }
}

export class AuthenticationInProgressError extends PayClientError {
  constructor(state: string) {
    super("AUTHENTICATION_IN_PROGRESS", "auth", `Authentication transition already running (${state})`, {
      state
    });
  }
}

/** The access token is missing, expired or refused. Call `refresh()` or log in again. */
export class TokenExpiredError extends PayClientError {
  constructor(
    message = "Access token expired",
    details?: ClientErrorDetails,
    options?: { cause?: unknown },
    code: Extract<ClientErrorCode, "TOKEN_EXPIRED" | "NOT_AUTHENTICATED"> = "TOKEN_EXPIRED"
  ) {
    super(code, "auth", message, details, options);
  }
}

export class NotAuthenticatedError extends TokenExpiredError {
  constructor(message = "No access token available; log in first") {
    super(message, undefined, undefined, "NOT_AUTHENTICATED");
  }
}

export class SolverExhaustedError extends PayClientError {
  constructor(iterations: number, difficulty: number) {
    super(
      "SOLVER_EXHAUSTED",
      "challenge",
      `Proof-of-work search gave up after ${iterations} iterations (difficulty ${difficulty})`,
      { iterations, difficulty }
    );
  }
}

export class SolverUnsupportedChallengeError extends PayClientError {
  constructor(message = "Challenge response shape is not recognised", details?: ClientErrorDetails) {
    super("SOLVER_UNSUPPORTED_CHALLENGE", "challenge", message, details);
  }
}

export class SolverDelegationFailedError extends PayClientError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SOLVER_DELEGATION_FAILED", "challenge", message, undefined, options);
  }
}

export class ChallengeUnresolvedError extends PayClientError {
  constructor(scope: string, status: number) {
    super("CHALLENGE_UNRESOLVED", "challenge", `Request still challenged after solving (scope ${scope})`, {
      scope,
      status
    });
  }
}

export class TransientRequestError extends PayClientError {
  constructor(message: string, details?: ClientErrorDetails, options?: { cause?: unknown }) {
    super("TRANSIENT_REQUEST_ERROR", "sending", message, details, options);
  }
}

export class SigningConfigurationError extends PayClientError {
  constructor(message: string) {
    super("SIGNING_CONFIGURATION_ERROR", "signing", message);
  }
}

export class RateLimitedError extends PayClientError {
  constructor(retryAfterMs?: number) {
    super("RATE_LIMITED", "sending", "Rate limit exceeded", { status: 429, retryAfterMs });
  }
}

export class ApiRequestError extends PayClientError {
  constructor(message: string, details: ClientErrorDetails) {
    super("API_REQUEST_FAILED", "sending", message, details);
  }
}

export class ValidationError extends PayClientError {
  constructor(message: string, details?: ClientErrorDetails) {
    super("VALIDATION_ERROR", "validation", message, details);
  }
}
