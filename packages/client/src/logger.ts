import { pino, type Logger } from "pino";
import type { Config } from "./types.js";

export type { Logger };

export function createLogger(level: Config["logLevel"] = "warn"): Logger {
  return pino({
    level,
    base: { service: "paybridge-client" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: ["accessToken", "refreshToken", "password", "signature", "token"],
      censor: "[redacted]"
    }
  });
}
