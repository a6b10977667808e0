export { PayClient, createPayClient, type ClientExtras, type PayClientOptions } from "./api-client.js";
export {
  AuthStateMachine,
  parseAuthorizationArtifact,
  type AuthorizationArtifact,
  type OnStateChange,
  type ParsedArtifact
} from "./auth.js";
export { parseChallenge, hasChallengeMarker } from "./challenge/parse.js";
export { encodeSolution, decodeSolution, meetsDifficulty, searchProofOfWork, workHash } from "./challenge/proof-of-work.js";
export { ChallengeSolver } from "./challenge/solver.js";
export { DelegatedCaptchaStrategy, ProofOfWorkStrategy } from "./challenge/strategies.js";
export type {
  CaptchaPuzzle,
  CaptchaSolver,
  ChallengeDescriptor,
  ChallengeStrategy,
  ChallengeToken,
  ProofOfWorkParams
} from "./challenge/types.js";
export { resolveConfig, getConfigPath } from "./config.js";
export * from "./errors.js";
export { DeviceIdentityProvider } from "./identity.js";
export { createLogger, type Logger } from "./logger.js";
export { Session, TransitionGate } from "./session.js";
export { RequestSigner, canonicalString, type UnsignedRequest } from "./signer.js";
export { TokenStore, type OnTokenChange } from "./token-store.js";
export { classifyResponse, type ClassifiedResponse } from "./transport/classify.js";
export { createFetcher, type Fetcher } from "./transport/fetcher.js";
export { TransportPipeline, type ApiResult, type CallOptions, type Endpoint } from "./transport/pipeline.js";
export type { AccessTokenCredentials, Config, Credentials, PhoneCredentials, ProxyConfig } from "./types.js";
