import type { ChallengeSolver } from "./challenge/solver.js";
import type { DeviceIdentityProvider } from "./identity.js";
import type { TokenStore } from "./token-store.js";

/** Tracks the running login or refresh so signed calls can wait it out. */
export class TransitionGate {
  private pending: Promise<unknown> | null = null;

  get busy(): boolean {
    return this.pending !== null;
  }

  track<T>(transition: Promise<T>): Promise<T> {
    const tracked = transition.finally(() => {
      if (this.pending === tracked) {
        this.pending = null;
      }
    });
    this.pending = tracked;
    return tracked;
  }

  async settled(): Promise<void> {
    while (this.pending) {
      await Promise.allSettled([this.pending]);
    }
  }
}

/** Per-client state shared by reference between signer, solver and pipeline. */
export class Session {
  readonly gate = new TransitionGate();

  constructor(
    readonly identity: DeviceIdentityProvider,
    readonly tokens: TokenStore,
    readonly challenges: ChallengeSolver
  ) {}
}
