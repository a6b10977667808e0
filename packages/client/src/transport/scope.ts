import type { ChallengeScopeMode } from "../types.js";

export function challengeScope(mode: ChallengeScopeMode, url: URL, sessionId: string): string {
  switch (mode) {
    case "host":
      return url.host;
    case "endpoint":
      return `${url.host}${url.pathname}`;
    case "session":
      return `session:${sessionId}`;
  }
}
