export interface ProofOfWorkParams {
  nonce: string;
  difficulty: number;
  key: string;
  /** Where the solved work is exchanged for the edge token, when the gate asks for it. */
  verifyUrl?: string;
}

export interface CaptchaPuzzle {
  apiUrl?: string;
  imageUrl?: string;
  problem?: string;
  raw: Record<string, unknown>;
}

export interface ChallengeDescriptor {
  proofOfWork?: ProofOfWorkParams;
  puzzle?: CaptchaPuzzle;
}

export interface ChallengeToken {
  value: string;
  acquiredAt: number;
  scope: string;
}

/** External capability for puzzles that cannot be computed (image or interactive CAPTCHA). */
export interface CaptchaSolver {
  solve(puzzle: CaptchaPuzzle): Promise<string | null | undefined>;
}

export interface ChallengeStrategy {
  readonly name: string;
  canSolve(challenge: ChallengeDescriptor): boolean;
  solve(challenge: ChallengeDescriptor): Promise<string>;
}
