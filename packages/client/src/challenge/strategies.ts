import { z } from "zod";
import {
  SolverDelegationFailedError,
  SolverUnsupportedChallengeError,
  TransientRequestError
} from "../errors.js";
import type { Logger } from "../logger.js";
import type { Fetcher, Response } from "../transport/fetcher.js";
import { encodeSolution, searchProofOfWork, type ProofOfWorkSolution } from "./proof-of-work.js";
import type { CaptchaSolver, ChallengeDescriptor, ChallengeStrategy } from "./types.js";

const VerifyResponseSchema = z.object({
  token: z.string().min(1).optional(),
  cookie: z.string().min(1).optional()
});

export interface ProofOfWorkStrategyOptions {
  maxIterations: number;
  chunkSize: number;
  fetcher: Fetcher;
  logger: Logger;
}

export class ProofOfWorkStrategy implements ChallengeStrategy {
  readonly name = "proof-of-work";

  constructor(private readonly options: ProofOfWorkStrategyOptions) {}

  canSolve(challenge: ChallengeDescriptor): boolean {
    return challenge.proofOfWork !== undefined;
  }

  async solve(challenge: ChallengeDescriptor): Promise<string> {
    const params = challenge.proofOfWork;
    if (!params) {
      throw new SolverUnsupportedChallengeError("Challenge carries no proof-of-work parameters");
    }

    const startedAt = Date.now();
    const solution = await searchProofOfWork(params, {
      maxIterations: this.options.maxIterations,
      chunkSize: this.options.chunkSize
    });
    this.options.logger.debug(
      { difficulty: params.difficulty, counter: solution.counter, elapsedMs: Date.now() - startedAt },
      "proof-of-work solved"
    );

    if (!params.verifyUrl) {
      return encodeSolution(solution);
    }
    return this.exchange(params.verifyUrl, solution);
  }

  private async exchange(verifyUrl: string, solution: ProofOfWorkSolution): Promise<string> {
    let response: Response;
    try {
      response = await this.options.fetcher(verifyUrl, {
        method: "POST",
        headers: { "content-type": "application/json", accept: "application/json" },
        body: JSON.stringify(solution)
      });
    } catch (error) {
      throw new TransientRequestError("Challenge verification request failed", { url: verifyUrl }, { cause: error });
    }

    if (!response.ok) {
      throw new SolverUnsupportedChallengeError(`Challenge verification returned HTTP ${response.status}`, {
        status: response.status
      });
    }

    const parsed = VerifyResponseSchema.safeParse(await response.json().catch(() => null));
    const token = parsed.success ? parsed.data.token ?? parsed.data.cookie : undefined;
    if (!token) {
      throw new SolverUnsupportedChallengeError("Challenge verification returned no token");
    }
    return token;
  }
}

export class DelegatedCaptchaStrategy implements ChallengeStrategy {
  readonly name = "delegated";

  constructor(private readonly captchaSolver?: CaptchaSolver) {}

  canSolve(challenge: ChallengeDescriptor): boolean {
    return challenge.puzzle !== undefined;
  }

  async solve(challenge: ChallengeDescriptor): Promise<string> {
    if (!challenge.puzzle) {
      throw new SolverUnsupportedChallengeError("Challenge carries no puzzle");
    }
    if (!this.captchaSolver) {
      throw new SolverDelegationFailedError("Challenge needs a CAPTCHA answer but no captchaSolver is configured");
    }

    let answer: string | null | undefined;
    try {
      answer = await this.captchaSolver.solve(challenge.puzzle);
    } catch (error) {
      throw new SolverDelegationFailedError("captchaSolver threw while solving the puzzle", { cause: error });
    }

    if (!answer) {
      throw new SolverDelegationFailedError("captchaSolver returned no answer");
    }
    return answer;
  }
}
