import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { ValidationError } from "./errors.js";
import type { Config } from "./types.js";
import { ConfigSchema } from "./types.js";

const ENV_MAPPINGS: Record<string, keyof Config> = {
  PAYBRIDGE_BASE_URL: "baseUrl",
  PAYBRIDGE_WEB_BASE_URL: "webBaseUrl",
  PAYBRIDGE_SIGNING_KEY: "signingKey",
  PAYBRIDGE_APP_VERSION: "appVersion",
  PAYBRIDGE_OS_TYPE: "osType",
  PAYBRIDGE_OS_VERSION: "osVersion",
  PAYBRIDGE_USER_AGENT: "userAgent",
  PAYBRIDGE_REQUEST_TIMEOUT_MS: "requestTimeoutMs",
  PAYBRIDGE_ACCESS_TOKEN_TTL_SECONDS: "accessTokenTtlSeconds",
  PAYBRIDGE_CHALLENGE_SCOPE: "challengeScope",
  PAYBRIDGE_CHALLENGE_TTL_MS: "challengeTtlMs",
  PAYBRIDGE_MAX_SOLVE_ITERATIONS: "maxSolveIterations",
  PAYBRIDGE_SOLVE_CHUNK_SIZE: "solveChunkSize",
  PAYBRIDGE_LOG_LEVEL: "logLevel"
};

const NUMERIC_KEYS = new Set<keyof Config>([
  "requestTimeoutMs",
  "accessTokenTtlSeconds",
  "challengeTtlMs",
  "maxSolveIterations",
  "solveChunkSize"
]);

export function getConfigDir(): string {
  return process.env.PAYBRIDGE_HOME || join(homedir(), ".paybridge");
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function loadConfigFile(): Record<string, unknown> {
  const path = getConfigPath();
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ValidationError(
      `Config file ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ValidationError(`Config file ${path} must contain a JSON object`, { path });
  }
  return { ...parsed };
}

function loadEnvConfig(): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const [envKey, configKey] of Object.entries(ENV_MAPPINGS)) {
    const value = process.env[envKey];
    if (value === undefined) continue;

    if (NUMERIC_KEYS.has(configKey)) {
      const parsed = parseInt(value, 10);
      if (!Number.isNaN(parsed)) {
        config[configKey] = parsed;
      }
    } else {
      config[configKey] = value;
    }
  }

  return config;
}

/** Defaults, then the config file, then the environment, then explicit overrides. */
export function resolveConfig(overrides: Partial<Config> = {}): Config {
  const merged: Record<string, unknown> = {};

  for (const layer of [loadConfigFile(), loadEnvConfig(), overrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) {
        merged[key] = value;
      }
    }
  }

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}
