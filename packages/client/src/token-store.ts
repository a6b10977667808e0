import type { TokenPair } from "@paybridge/types";
import { NotAuthenticatedError } from "./errors.js";

export type OnTokenChange = (pair: TokenPair | null) => void;

/**
 * Sole owner of the session's token pair. Replacing a pair never moves
 * `expiresAt` backwards.
 */
export class TokenStore {
  private pair: TokenPair | null = null;

  constructor(private readonly onChange?: OnTokenChange) {}

  current(): TokenPair {
    if (!this.pair) {
      throw new NotAuthenticatedError();
    }
    return this.pair;
  }

  peek(): TokenPair | null {
    return this.pair;
  }

  set(next: TokenPair): TokenPair {
    const previous = this.pair;
    this.pair = Object.freeze({
      ...next,
      expiresAt: previous ? Math.max(previous.expiresAt, next.expiresAt) : next.expiresAt
    });
    this.onChange?.(this.pair);
    return this.pair;
  }

  invalidate(): void {
    if (!this.pair) return;
    this.pair = null;
    this.onChange?.(null);
  }
}
