import { unwrapEnvelope, type UnwrappedBody } from "@paybridge/types";
import { hasChallengeMarker, parseChallenge } from "../challenge/parse.js";
import type { ChallengeDescriptor } from "../challenge/types.js";
import type { Response } from "./fetcher.js";

export const WAF_ACTION_HEADER = "x-amzn-waf-action";

const CHALLENGE_STATUSES = new Set([202, 403, 405]);

export type ClassifiedResponse =
  | { kind: "success"; status: number; body: UnwrappedBody }
  | { kind: "challenge"; status: number; challenge: ChallengeDescriptor | null }
  | { kind: "unauthorized"; status: number }
  | { kind: "rate-limited"; status: number; retryAfterMs?: number }
  | { kind: "rejected"; status: number; resultCode?: string; message: string }
  | { kind: "transient"; status: number; message: string };

function parseJson(text: string): { ok: true; value: unknown } | { ok: false } {
  if (text.trim() === "") return { ok: true, value: {} };
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;
  const seconds = parseInt(value, 10);
  return Number.isNaN(seconds) ? undefined : seconds * 1000;
}

/** Reads the body once and decides what the pipeline does next. */
export async function classifyResponse(response: Response): Promise<ClassifiedResponse> {
  const { status } = response;
  const text = await response.text();

  const wafAction = response.headers.get(WAF_ACTION_HEADER);
  if (wafAction || CHALLENGE_STATUSES.has(status)) {
    const challenge = parseChallenge(text);
    if (wafAction || challenge || hasChallengeMarker(text)) {
      return { kind: "challenge", status, challenge };
    }
  }

  if (status === 401) {
    return { kind: "unauthorized", status };
  }
  if (status === 429) {
    return { kind: "rate-limited", status, retryAfterMs: parseRetryAfter(response.headers.get("retry-after")) };
  }
  if (status >= 500) {
    return { kind: "transient", status, message: `HTTP ${status}: ${text.slice(0, 200)}` };
  }

  const json = parseJson(text);
  if (status >= 400) {
    const body = json.ok ? unwrapEnvelope(json.value) : undefined;
    return {
      kind: "rejected",
      status,
      resultCode: body?.resultCode,
      message: body?.resultMessage ?? `HTTP ${status}`
    };
  }
  if (!json.ok) {
    return { kind: "transient", status, message: `HTTP ${status} with unparseable body` };
  }
  return { kind: "success", status, body: unwrapEnvelope(json.value) };
}
