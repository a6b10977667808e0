import { z } from "zod";

export const ChallengeScopeSchema = z.enum(["host", "endpoint", "session"]);

export type ChallengeScopeMode = z.infer<typeof ChallengeScopeSchema>;

export const ConfigSchema = z.object({
  baseUrl: z.string().url().default("https://app4.paypay.ne.jp"),
  webBaseUrl: z.string().url().default("https://www.paypay.ne.jp"),
  // Backend-issued HMAC key. Left unset on purpose: signing fails until the
  // embedder supplies the key recovered from the app build it targets.
  signingKey: z.string().min(1).optional(),
  appVersion: z.string().default("3.80.0"),
  osType: z.enum(["IOS", "ANDROID"]).default("IOS"),
  osVersion: z.string().default("16.0"),
  userAgent: z.string().optional(),
  requestTimeoutMs: z.number().int().positive().default(30000),
  accessTokenTtlSeconds: z.number().int().positive().default(3600),
  challengeScope: ChallengeScopeSchema.default("host"),
  challengeTtlMs: z.number().int().positive().default(300000),
  maxSolveIterations: z.number().int().positive().default(5_000_000),
  solveChunkSize: z.number().int().positive().default(10000),
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("warn")
});

export type Config = z.infer<typeof ConfigSchema>;

export interface PhoneCredentials {
  phoneNumber: string;
  password: string;
}

export interface AccessTokenCredentials {
  accessToken: string;
  refreshToken?: string;
}

export type Credentials = PhoneCredentials | AccessTokenCredentials;

/** Either a single proxy URL (`host:port` is read as http) or one per scheme. */
export type ProxyConfig = string | { http?: string; https?: string };

export function isPhoneCredentials(credentials: Credentials): credentials is PhoneCredentials {
  return "phoneNumber" in credentials;
}
