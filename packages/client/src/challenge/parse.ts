import type { ChallengeDescriptor } from "./types.js";

const BODY_MARKERS = ["aws-waf-token", "AwsWafCaptcha", "AwsWafIntegration", "challenge.aws"];

const PUZZLE_FIELDS = ["apiUrl", "imageUrl", "problem"] as const;

export function hasChallengeMarker(text: string): boolean {
  return BODY_MARKERS.some((marker) => text.includes(marker));
}

function asRecord(value: unknown): Record<string, unknown> | null {
  if (!value || typeof value !== "object" || Array.isArray(value)) return null;
  return Object.fromEntries(Object.entries(value));
}

function readDifficulty(value: unknown): number | null {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) return value;
  if (typeof value === "string" && /^\d+$/.test(value)) return parseInt(value, 10);
  return null;
}

function readString(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function describe(fields: Record<string, unknown>): ChallengeDescriptor | null {
  const descriptor: ChallengeDescriptor = {};

  const nonce = readString(fields.nonce);
  const difficulty = readDifficulty(fields.difficulty);
  if (nonce && difficulty !== null) {
    descriptor.proofOfWork = { nonce, difficulty, key: readString(fields.key) ?? "" };
    const verifyUrl = readString(fields.verifyUrl);
    if (verifyUrl) {
      descriptor.proofOfWork.verifyUrl = verifyUrl;
    }
  }

  if (PUZZLE_FIELDS.some((field) => readString(fields[field]))) {
    descriptor.puzzle = {
      apiUrl: readString(fields.apiUrl),
      imageUrl: readString(fields.imageUrl),
      problem: readString(fields.problem),
      raw: fields
    };
  }

  return descriptor.proofOfWork || descriptor.puzzle ? descriptor : null;
}

function fromJson(text: string): ChallengeDescriptor | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }

  const body = asRecord(parsed);
  if (!body) return null;
  const nested = asRecord(body.challenge);
  return (nested && describe(nested)) ?? describe(body);
}

// Challenge pages pass their parameters as an object literal to the WAF
// integration script, e.g. `AwsWafCaptcha.renderCaptcha(container, { apiUrl: "..." })`.
const SCRIPT_FIELD = /\b(nonce|difficulty|key|verifyUrl|apiUrl|imageUrl|problem)\s*:\s*(?:"([^"]*)"|'([^']*)'|(\d+))/g;

function fromHtml(text: string): ChallengeDescriptor | null {
  if (!hasChallengeMarker(text)) return null;

  const fields: Record<string, unknown> = {};
  for (const match of text.matchAll(SCRIPT_FIELD)) {
    const [, name, doubleQuoted, singleQuoted, numeric] = match;
    if (name === undefined || name in fields) continue;
    fields[name] = doubleQuoted ?? singleQuoted ?? numeric;
  }
  return describe(fields);
}

/** Extracts solvable parameters from a challenge response body, or `null` if none are recognised. */
export function parseChallenge(text: string): ChallengeDescriptor | null {
  const trimmed = text.trim();
  if (trimmed.startsWith("{")) {
    return fromJson(trimmed);
  }
  return fromHtml(trimmed);
}
