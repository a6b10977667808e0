import { describe, it } from "node:test";
import assert from "node:assert/strict";
import type { TokenPair } from "@paybridge/types";
import { NotAuthenticatedError, TokenExpiredError } from "../src/errors.js";
import { TokenStore } from "../src/token-store.js";

describe("TokenStore", () => {
  it("signals NotAuthenticated when empty", () => {
    const store = new TokenStore();

    assert.throws(() => store.current(), NotAuthenticatedError);
    assert.throws(() => store.current(), TokenExpiredError);
    assert.throws(() => store.current(), { code: "NOT_AUTHENTICATED", stage: "auth" });
    assert.equal(store.peek(), null);
  });

  it("replaces the pair and never moves expiresAt backwards", () => {
    const store = new TokenStore();
    store.set({ accessToken: "A1", refreshToken: "R1", expiresAt: 2000 });

    const replaced = store.set({ accessToken: "A2", refreshToken: "R2", expiresAt: 1000 });

    assert.deepEqual(replaced, { accessToken: "A2", refreshToken: "R2", expiresAt: 2000 });
    assert.equal(store.current().accessToken, "A2");

    store.set({ accessToken: "A3", expiresAt: 3000 });
    assert.equal(store.current().expiresAt, 3000);
  });

  it("notifies listeners on set and invalidate", () => {
    const seen: Array<TokenPair | null> = [];
    const store = new TokenStore((pair) => seen.push(pair));

    store.set({ accessToken: "A1", expiresAt: 1000 });
    store.invalidate();
    store.invalidate();

    assert.deepEqual(seen, [{ accessToken: "A1", expiresAt: 1000 }, null]);
    assert.equal(store.peek(), null);
  });
});
