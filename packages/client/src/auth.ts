import { isSuccessResult, TokenPayloadSchema, type AuthState, type TokenPair, type TokenPayload } from "@paybridge/types";
import {
  ApiRequestError,
  AuthenticationInProgressError,
  AuthenticationRejectedError,
  InvalidAuthorizationArtifactError,
  NotAuthenticatedError,
  TokenExpiredError
} from "./errors.js";
import type { Logger } from "./logger.js";
import type { Session } from "./session.js";
import type { ApiResult, TransportPipeline } from "./transport/pipeline.js";
import type { PhoneCredentials } from "./types.js";

/** A captured OAuth callback URL, its bare code, or a token pair obtained elsewhere. */
export type AuthorizationArtifact = string | { accessToken: string; refreshToken?: string };

export type ParsedArtifact = { kind: "code"; code: string } | { kind: "token"; accessToken: string; refreshToken?: string };

export type OnStateChange = (next: AuthState, previous: AuthState) => void;

const CODE_PATTERN = /^[A-Za-z0-9_-]+$/;

export function parseAuthorizationArtifact(artifact: AuthorizationArtifact): ParsedArtifact {
  if (typeof artifact !== "string") {
    if (typeof artifact.accessToken !== "string" || artifact.accessToken.trim() === "") {
      throw new InvalidAuthorizationArtifactError("accessToken must be a non-empty string");
    }
    return { kind: "token", accessToken: artifact.accessToken, refreshToken: artifact.refreshToken };
  }

  const value = artifact.trim();
  if (value.includes("://")) {
    let url: URL;
    try {
      url = new URL(value);
    } catch (error) {
      throw new InvalidAuthorizationArtifactError(
        `Authorization URL could not be parsed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    const code = url.searchParams.get("id") ?? url.searchParams.get("code");
    if (!code || !CODE_PATTERN.test(code)) {
      throw new InvalidAuthorizationArtifactError("Authorization URL carries no id or code parameter");
    }
    return { kind: "code", code };
  }

  if (!CODE_PATTERN.test(value)) {
    throw new InvalidAuthorizationArtifactError("Authorization artifact is neither a URL nor a code");
  }
  return { kind: "code", code: value };
}

export interface AuthStateMachineOptions {
  credentials?: PhoneCredentials;
  accessTokenTtlSeconds: number;
  logger: Logger;
  onStateChange?: OnStateChange;
}

export class AuthStateMachine {
  private state: AuthState;
  private refreshing: Promise<TokenPair> | null = null;
  private loginAttempt = 0;
  private readonly logger: Logger;

  constructor(
    private readonly session: Session,
    private readonly pipeline: TransportPipeline,
    private readonly options: AuthStateMachineOptions
  ) {
    this.logger = options.logger.child({ component: "auth" });
    this.state = session.tokens.peek() ? "authenticated" : "unauthenticated";
  }

  get current(): AuthState {
    return this.state;
  }

  async login(artifact: AuthorizationArtifact): Promise<TokenPair> {
    this.assertIdle();
    const parsed = parseAuthorizationArtifact(artifact);
    const previous = this.state;
    const attempt = ++this.loginAttempt;

    this.transition("authenticating");
    const exchange =
      parsed.kind === "token"
        ? Promise.resolve(
            this.toTokenPair({ accessToken: parsed.accessToken, refreshToken: parsed.refreshToken })
          )
        : this.exchangeCode(parsed.code);

    return this.session.gate.track(
      exchange.then(
        (pair) => {
          if (this.state !== "authenticating" || attempt !== this.loginAttempt) {
            // logged out while the exchange was in flight
            throw new NotAuthenticatedError("Session ended during login");
          }
          this.session.tokens.invalidate();
          const stored = this.session.tokens.set(pair);
          this.transition("authenticated");
          this.logger.info({ via: parsed.kind }, "logged in");
          return stored;
        },
        (error: unknown) => {
          if (this.state === "authenticating" && attempt === this.loginAttempt) {
            this.transition(previous);
          }
          throw error;
        }
      )
    );
  }

  /** Concurrent callers share one refresh call and receive the same pair. */
  async refresh(): Promise<TokenPair> {
    if (this.refreshing) {
      return this.refreshing;
    }
    if (this.state === "authenticating") {
      throw new AuthenticationInProgressError(this.state);
    }
    if (this.state !== "authenticated") {
      throw new NotAuthenticatedError("Cannot refresh without an authenticated session; log in again");
    }

    const current = this.session.tokens.current();
    this.transition("refreshing");
    const work = this.exchangeRefreshToken(current).then(
      (pair) => {
        if (this.state !== "refreshing") {
          // logged out while the refresh was in flight
          throw new NotAuthenticatedError("Session ended during token refresh");
        }
        const stored = this.session.tokens.set(pair);
        this.transition("authenticated");
        this.logger.info({ expiresAt: stored.expiresAt }, "token refreshed");
        return stored;
      },
      (error: unknown) => {
        if (this.state === "refreshing") {
          this.session.tokens.invalidate();
          this.transition("unauthenticated");
        }
        this.logger.warn({ error: error instanceof Error ? error.message : String(error) }, "token refresh failed");
        throw new TokenExpiredError("Token refresh failed; log in again", undefined, { cause: error });
      }
    );
    this.refreshing = this.session.gate.track(work).finally(() => {
      this.refreshing = null;
    });
    return this.refreshing;
  }

  logout(): void {
    this.session.tokens.invalidate();
    this.session.challenges.clear();
    this.transition("logged-out");
    this.logger.info("logged out");
  }

  private assertIdle(): void {
    if (this.state === "authenticating" || this.state === "refreshing") {
      throw new AuthenticationInProgressError(this.state);
    }
  }

  private transition(next: AuthState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.logger.debug({ from: previous, to: next }, "auth state changed");
    this.options.onStateChange?.(next, previous);
  }

  private async exchangeCode(code: string): Promise<TokenPair> {
    const identity = this.session.identity.identity();
    const device = { deviceUuid: identity.deviceId, clientUuid: identity.clientId };
    const { credentials } = this.options;

    if (credentials) {
      const started = await this.authCall("/bff/v2/oauth2/par", {
        phoneNumber: credentials.phoneNumber,
        password: credentials.password,
        ...device
      });
      if (!isSuccessResult(started)) {
        throw new AuthenticationRejectedError("Login start was declined", { resultCode: started.resultCode });
      }
    }

    const confirmed = await this.authCall("/bff/v2/oauth2/token", device, { id: code });
    return this.toTokenPair(this.readTokenPayload(confirmed, "Authorization code was declined"));
  }

  private async exchangeRefreshToken(current: TokenPair): Promise<TokenPair> {
    if (!current.refreshToken) {
      throw new TokenExpiredError("No refresh token available");
    }
    const result = await this.authCall("/bff/v2/oauth2/refresh", { refreshToken: current.refreshToken });
    const payload = this.readTokenPayload(result, "Refresh token was declined");
    return this.toTokenPair({ ...payload, refreshToken: payload.refreshToken ?? current.refreshToken });
  }

  private async authCall(path: string, body: Record<string, string>, query?: Record<string, string>): Promise<ApiResult> {
    try {
      return await this.pipeline.call({ method: "POST", path, authenticated: false }, body, { query });
    } catch (error) {
      // 401 and other client errors on the auth routes mean the backend declined the artifact
      if (error instanceof ApiRequestError || error instanceof TokenExpiredError) {
        throw new AuthenticationRejectedError(error.message, error.details, { cause: error });
      }
      throw error;
    }
  }

  private readTokenPayload(result: ApiResult, message: string): TokenPayload {
    const parsed = TokenPayloadSchema.safeParse(result.payload);
    if (!isSuccessResult(result) || !parsed.success) {
      throw new AuthenticationRejectedError(message, { resultCode: result.resultCode });
    }
    return parsed.data;
  }

  private toTokenPair(payload: { accessToken: string; refreshToken?: string; expiresIn?: number }): TokenPair {
    const ttlSeconds = payload.expiresIn ?? this.options.accessTokenTtlSeconds;
    return {
      accessToken: payload.accessToken,
      refreshToken: payload.refreshToken,
      expiresAt: Date.now() + ttlSeconds * 1000
    };
  }
}
