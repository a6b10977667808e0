import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  decodeSolution,
  encodeSolution,
  meetsDifficulty,
  searchProofOfWork,
  workHash
} from "../src/challenge/proof-of-work.js";
import { SolverExhaustedError } from "../src/errors.js";

describe("proof-of-work", () => {
  it("counts leading zero hex digits", () => {
    assert.equal(meetsDifficulty("00ab", 2), true);
    assert.equal(meetsDifficulty("0a0b", 2), false);
    assert.equal(meetsDifficulty("abcd", 0), true);
    assert.equal(meetsDifficulty("0000", 5), false);
  });

  it("returns the lowest counter that meets the difficulty", async () => {
    const params = { nonce: "abc", difficulty: 2, key: "k" };

    const solution = await searchProofOfWork(params, { maxIterations: 1_000_000, chunkSize: 1000 });

    assert.equal(solution.nonce, "abc");
    assert.equal(solution.hash, workHash("k", "abc", solution.counter));
    assert.ok(solution.hash.startsWith("00"));
    for (let counter = 0; counter < solution.counter; counter++) {
      assert.equal(meetsDifficulty(workHash("k", "abc", counter), 2), false);
    }
  });

  it("gives up at the iteration bound with SolverExhausted", async () => {
    await assert.rejects(
      searchProofOfWork({ nonce: "abc", difficulty: 65, key: "" }, { maxIterations: 2000, chunkSize: 500 }),
      (error: unknown) => {
        assert.ok(error instanceof SolverExhaustedError);
        assert.equal(error.code, "SOLVER_EXHAUSTED");
        assert.equal(error.stage, "challenge");
        assert.deepEqual(error.details, { iterations: 2000, difficulty: 65 });
        return true;
      }
    );
  });

  it("yields to the event loop between chunks", async () => {
    let immediateRan = false;
    setImmediate(() => {
      immediateRan = true;
    });

    let ranBeforeSettling = false;
    await assert.rejects(
      searchProofOfWork({ nonce: "abc", difficulty: 65, key: "" }, { maxIterations: 300, chunkSize: 100 }).catch(
        (error: unknown) => {
          ranBeforeSettling = immediateRan;
          throw error;
        }
      ),
      SolverExhaustedError
    );

    assert.equal(ranBeforeSettling, true);
  });

  it("stops when the signal aborts", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stop"));

    await assert.rejects(
      searchProofOfWork(
        { nonce: "abc", difficulty: 65, key: "" },
        { maxIterations: 1000, chunkSize: 10, signal: controller.signal }
      ),
      { message: "stop" }
    );
  });

  it("encodes solutions as base64url JSON", () => {
    const solution = { nonce: "abc", counter: 42, hash: "00ff" };
    const token = encodeSolution(solution);

    assert.match(token, /^[A-Za-z0-9_-]+$/);
    assert.deepEqual(JSON.parse(Buffer.from(token, "base64url").toString("utf-8")), solution);
    assert.deepEqual(decodeSolution(token), solution);
  });
});
