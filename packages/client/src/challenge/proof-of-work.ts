import { createHash } from "node:crypto";
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import { z } from "zod";
import { SolverExhaustedError } from "../errors.js";
import type { ProofOfWorkParams } from "./types.js";

const SolutionSchema = z.object({
  nonce: z.string(),
  counter: z.number().int().nonnegative(),
  hash: z.string()
});

export type ProofOfWorkSolution = z.infer<typeof SolutionSchema>;

export interface SearchOptions {
  maxIterations: number;
  /** Iterations between yields to the event loop. */
  chunkSize: number;
  signal?: AbortSignal;
}

export function workHash(key: string, nonce: string, counter: number): string {
  return createHash("sha256").update(`${key}${nonce}${counter}`).digest("hex");
}

/** Difficulty counts leading zero hex digits. */
export function meetsDifficulty(hash: string, difficulty: number): boolean {
  return difficulty <= hash.length && hash.startsWith("0".repeat(difficulty));
}

export async function searchProofOfWork(
  params: Pick<ProofOfWorkParams, "nonce" | "difficulty" | "key">,
  options: SearchOptions
): Promise<ProofOfWorkSolution> {
  const { nonce, difficulty, key } = params;

  for (let counter = 0; counter < options.maxIterations; counter++) {
    if (counter > 0 && counter % options.chunkSize === 0) {
      await yieldToEventLoop();
      options.signal?.throwIfAborted();
    }

    const hash = workHash(key, nonce, counter);
    if (meetsDifficulty(hash, difficulty)) {
      return { nonce, counter, hash };
    }
  }

  throw new SolverExhaustedError(options.maxIterations, difficulty);
}

export function encodeSolution(solution: ProofOfWorkSolution): string {
  return Buffer.from(JSON.stringify(solution), "utf-8").toString("base64url");
}

export function decodeSolution(token: string): ProofOfWorkSolution {
  return SolutionSchema.parse(JSON.parse(Buffer.from(token, "base64url").toString("utf-8")));
}
