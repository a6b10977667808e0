import { Headers, Response, type RequestInit } from "undici";
import { ChallengeSolver } from "../src/challenge/solver.js";
import { ProofOfWorkStrategy } from "../src/challenge/strategies.js";
import type { ChallengeStrategy } from "../src/challenge/types.js";
import { DeviceIdentityProvider } from "../src/identity.js";
import { createLogger } from "../src/logger.js";
import { Session } from "../src/session.js";
import { RequestSigner } from "../src/signer.js";
import { TokenStore } from "../src/token-store.js";
import type { Fetcher } from "../src/transport/fetcher.js";
import { TransportPipeline } from "../src/transport/pipeline.js";
import { ConfigSchema, type Config } from "../src/types.js";

export const TEST_SIGNING_KEY = "test-signing-key";

export const silentLogger = createLogger("silent");

export interface RecordedCall {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
}

export type FetchHandler = (call: RecordedCall, index: number, init: RequestInit) => Response | Promise<Response>;

export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers }
  });
}

export function okEnvelope(payload: unknown): Response {
  return jsonResponse({ header: { resultCode: "S0000", resultMessage: "Success" }, payload });
}

export function challengeResponse(body: unknown = { nonce: "abc", difficulty: 1 }): Response {
  return jsonResponse(body, 405);
}

export function createFakeFetcher(handler: FetchHandler): { fetcher: Fetcher; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetcher: Fetcher = async (url, init) => {
    init.signal?.throwIfAborted();
    const call: RecordedCall = {
      url,
      method: init.method ?? "GET",
      headers: Object.fromEntries(new Headers(init.headers)),
      body: typeof init.body === "string" ? init.body : undefined
    };
    calls.push(call);
    return handler(call, calls.length - 1, init);
  };
  return { fetcher, calls };
}

export function testConfig(overrides: Partial<Config> = {}): Config {
  return ConfigSchema.parse({ signingKey: TEST_SIGNING_KEY, logLevel: "silent", ...overrides });
}

export class CountingStrategy implements ChallengeStrategy {
  readonly name = "counting";
  calls = 0;

  constructor(
    private readonly delayMs = 0,
    private readonly prefix = "solved"
  ) {}

  canSolve(): boolean {
    return true;
  }

  async solve(): Promise<string> {
    this.calls++;
    const value = `${this.prefix}-${this.calls}`;
    if (this.delayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.delayMs));
    }
    return value;
  }
}

export interface Harness {
  session: Session;
  pipeline: TransportPipeline;
  config: Config;
  calls: RecordedCall[];
}

export function createHarness(
  handler: FetchHandler,
  options: { config?: Partial<Config>; strategies?: ChallengeStrategy[]; accessToken?: string; refreshToken?: string } = {}
): Harness {
  const config = testConfig(options.config);
  const { fetcher, calls } = createFakeFetcher(handler);
  const strategies = options.strategies ?? [
    new ProofOfWorkStrategy({
      maxIterations: config.maxSolveIterations,
      chunkSize: config.solveChunkSize,
      fetcher,
      logger: silentLogger
    })
  ];

  const tokens = new TokenStore();
  if (options.accessToken) {
    tokens.set({ accessToken: options.accessToken, refreshToken: options.refreshToken, expiresAt: Date.now() + 60_000 });
  }
  const session = new Session(
    new DeviceIdentityProvider(),
    tokens,
    new ChallengeSolver({ strategies, ttlMs: config.challengeTtlMs, logger: silentLogger })
  );
  const pipeline = new TransportPipeline(session, {
    config,
    signer: new RequestSigner(config.signingKey),
    fetcher,
    logger: silentLogger
  });
  return { session, pipeline, config, calls };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
