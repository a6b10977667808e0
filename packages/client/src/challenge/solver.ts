import { SolverUnsupportedChallengeError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { ChallengeDescriptor, ChallengeStrategy, ChallengeToken } from "./types.js";

export interface ChallengeSolverOptions {
  strategies: ChallengeStrategy[];
  ttlMs: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Resolves edge challenges into tokens and caches them per scope. At most one
 * resolution runs per scope; concurrent callers share it.
 */
export class ChallengeSolver {
  private readonly cache = new Map<string, ChallengeToken>();
  private readonly inFlight = new Map<string, Promise<ChallengeToken>>();
  private readonly now: () => number;

  constructor(private readonly options: ChallengeSolverOptions) {
    this.now = options.now ?? Date.now;
  }

  tokenFor(scope: string): ChallengeToken | null {
    const token = this.cache.get(scope);
    if (!token) return null;
    if (this.now() - token.acquiredAt >= this.options.ttlMs) {
      this.cache.delete(scope);
      return null;
    }
    return token;
  }

  /**
   * @param carried the token value the challenged request was sent with; a
   * cached token other than this one is returned as-is instead of solving again
   */
  resolve(scope: string, challenge: ChallengeDescriptor | null, carried?: string): Promise<ChallengeToken> {
    const pending = this.inFlight.get(scope);
    if (pending) return pending;

    const cached = this.tokenFor(scope);
    if (cached && cached.value !== carried) {
      return Promise.resolve(cached);
    }
    if (cached) {
      this.cache.delete(scope);
    }

    const resolution = this.runStrategies(scope, challenge)
      .then((value) => {
        const token: ChallengeToken = { value, acquiredAt: this.now(), scope };
        this.cache.set(scope, token);
        return token;
      })
      .finally(() => {
        this.inFlight.delete(scope);
      });
    this.inFlight.set(scope, resolution);
    return resolution;
  }

  /** Drops the scope's token; with `value`, only if that is still the cached one. */
  invalidate(scope: string, value?: string): void {
    const cached = this.cache.get(scope);
    if (cached && (value === undefined || cached.value === value)) {
      this.cache.delete(scope);
      this.options.logger.debug({ scope }, "challenge token dropped");
    }
  }

  clear(): void {
    this.cache.clear();
  }

  private async runStrategies(scope: string, challenge: ChallengeDescriptor | null): Promise<string> {
    const applicable = challenge ? this.options.strategies.filter((strategy) => strategy.canSolve(challenge)) : [];
    if (!challenge || applicable.length === 0) {
      throw new SolverUnsupportedChallengeError(undefined, { scope });
    }

    let lastError: unknown;
    for (const strategy of applicable) {
      try {
        const value = await strategy.solve(challenge);
        this.options.logger.info({ scope, strategy: strategy.name }, "challenge solved");
        return value;
      } catch (error) {
        lastError = error;
        this.options.logger.warn(
          { scope, strategy: strategy.name, error: error instanceof Error ? error.message : String(error) },
          "challenge strategy failed"
        );
      }
    }
    throw lastError;
  }
}
