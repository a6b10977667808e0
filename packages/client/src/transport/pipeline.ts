import {
  ApiRequestError,
  ChallengeUnresolvedError,
  RateLimitedError,
  TokenExpiredError,
  TransientRequestError
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { Session } from "../session.js";
import { canonicalQuery, type RequestSigner } from "../signer.js";
import type { Config } from "../types.js";
import { classifyResponse, type ClassifiedResponse } from "./classify.js";
import type { Fetcher } from "./fetcher.js";
import { challengeScope } from "./scope.js";

export const CHALLENGE_TOKEN_HEADER = "x-aws-waf-token";
export const CHALLENGE_TOKEN_COOKIE = "aws-waf-token";

export interface Endpoint {
  method: "GET" | "POST" | "PUT" | "DELETE";
  path: string;
  /** Defaults to the app API host. */
  baseUrl?: string;
  /** Whether the call carries the bearer token. Defaults to true. */
  authenticated?: boolean;
}

export interface CallOptions {
  query?: Record<string, string>;
  headers?: Record<string, string>;
  signal?: AbortSignal;
}

export interface ApiResult<T = unknown> {
  status: number;
  resultCode?: string;
  resultMessage?: string;
  payload: T;
  /** True when the call was retried after solving a challenge. */
  retried: boolean;
}

interface PreparedRequest {
  endpoint: Endpoint;
  url: URL;
  scope: string;
  body?: string;
  accessToken?: string;
  options: CallOptions;
}

export interface TransportPipelineDeps {
  config: Config;
  signer: RequestSigner;
  fetcher: Fetcher;
  logger: Logger;
}

/** Settles with `work`, or rejects with the abort reason as soon as `signal` fires. `work` keeps running. */
function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;
  if (signal.aborted) return Promise.reject(signal.reason);

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function defaultUserAgent(config: Config): string {
  return config.osType === "IOS"
    ? `PayPay/${config.appVersion} (iPhone; iOS ${config.osVersion}; Scale/3.00)`
    : `PayPay/${config.appVersion} (Android ${config.osVersion})`;
}

/** The one chokepoint for outbound calls: sign, attach challenge token, send, classify, retry once. */
export class TransportPipeline {
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: Logger;

  constructor(
    private readonly session: Session,
    private readonly deps: TransportPipelineDeps
  ) {
    const { config } = deps;
    this.logger = deps.logger.child({ component: "transport" });
    this.defaultHeaders = {
      "User-Agent": config.userAgent ?? defaultUserAgent(config),
      Accept: "application/json",
      "Content-Type": "application/json",
      "Client-OS-Type": config.osType,
      "Client-OS-Version": config.osVersion,
      "Client-App-Version": config.appVersion,
      "Client-Mode": "NORMAL"
    };
  }

  async call(endpoint: Endpoint, payload?: unknown, options: CallOptions = {}): Promise<ApiResult> {
    const request = await this.prepare(endpoint, payload, options);
    const { challenges } = this.session;

    const carried = challenges.tokenFor(request.scope)?.value;
    const first = await this.send(request, carried);
    if (first.kind !== "challenge") {
      return this.settle(first, false);
    }

    this.logger.info(
      { scope: request.scope, path: endpoint.path, status: first.status, carriedToken: carried !== undefined },
      "challenge required"
    );
    // The solve is shared per scope; an abort releases only this caller.
    const token = await untilAborted(challenges.resolve(request.scope, first.challenge, carried), options.signal);

    // A login or refresh may have started while solving.
    const retry = { ...request, accessToken: await this.bearer(endpoint, options.signal) };
    const second = await this.send(retry, token.value);
    if (second.kind === "challenge") {
      challenges.invalidate(request.scope, token.value);
      throw new ChallengeUnresolvedError(request.scope, second.status);
    }
    return this.settle(second, true);
  }

  /** Waits out any auth transition, then reads the current token for authenticated endpoints. */
  private async bearer(endpoint: Endpoint, signal?: AbortSignal): Promise<string | undefined> {
    if (!(endpoint.authenticated ?? true)) {
      return undefined;
    }
    await untilAborted(this.session.gate.settled(), signal);
    return this.session.tokens.current().accessToken;
  }

  private async prepare(endpoint: Endpoint, payload: unknown, options: CallOptions): Promise<PreparedRequest> {
    const accessToken = await this.bearer(endpoint, options.signal);

    const url = new URL(endpoint.path, endpoint.baseUrl ?? this.deps.config.baseUrl);
    const query = canonicalQuery(options.query);
    if (query) {
      url.search = query;
    }

    return {
      endpoint,
      url,
      scope: challengeScope(this.deps.config.challengeScope, url, this.session.identity.identity().installId),
      body: payload === undefined ? undefined : JSON.stringify(payload),
      accessToken,
      options
    };
  }

  private async send(request: PreparedRequest, challengeToken?: string): Promise<ClassifiedResponse> {
    const { endpoint, url, body, options } = request;
    const signed = this.deps.signer.sign(
      { method: endpoint.method, path: url.pathname, query: options.query, body, timestamp: Date.now() },
      this.session.identity.identity(),
      request.accessToken
    );

    const headers: Record<string, string> = { ...this.defaultHeaders, ...options.headers, ...signed };
    if (challengeToken) {
      headers[CHALLENGE_TOKEN_HEADER] = challengeToken;
      headers.Cookie = `${CHALLENGE_TOKEN_COOKIE}=${challengeToken}`;
    }

    const timeout = AbortSignal.timeout(this.deps.config.requestTimeoutMs);
    const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

    try {
      const response = await this.deps.fetcher(url.toString(), { method: endpoint.method, headers, body, signal });
      return await classifyResponse(response);
    } catch (error) {
      if (options.signal?.aborted) {
        throw error;
      }
      const reason = timeout.aborted ? "timed out" : "failed";
      this.logger.warn(
        { path: endpoint.path, error: error instanceof Error ? error.message : String(error) },
        `request ${reason}`
      );
      throw new TransientRequestError(`${endpoint.method} ${endpoint.path} ${reason}`, { path: endpoint.path }, { cause: error });
    }
  }

  private settle(result: Exclude<ClassifiedResponse, { kind: "challenge" }>, retried: boolean): ApiResult {
    switch (result.kind) {
      case "success":
        return {
          status: result.status,
          resultCode: result.body.resultCode,
          resultMessage: result.body.resultMessage,
          payload: result.body.payload,
          retried
        };
      case "unauthorized":
        throw new TokenExpiredError("Access token expired or was refused", { status: result.status });
      case "rate-limited":
        throw new RateLimitedError(result.retryAfterMs);
      case "rejected":
        throw new ApiRequestError(result.message, { status: result.status, resultCode: result.resultCode });
      case "transient":
        throw new TransientRequestError(result.message, { status: result.status });
    }
  }
}
