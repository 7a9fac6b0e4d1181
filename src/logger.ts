import { pino } from "pino";
import type { Logger } from "pino";

export type { Logger };

const REDACT_PATHS = [
  "req.headers.authorization",
  "headers.authorization",
  "password",
  "*.password",
  "token",
  "*.token",
  "accessToken",
  "refreshToken",
  "*.refresh_token",
];

export function createLogger(level = "info"): Logger {
  return pino({
    name: "storefront-gateway",
    level,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
  });
}

export const silentLogger: Logger = pino({ level: "silent" });
