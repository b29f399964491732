/**
 * logger.ts — pino loggers for the dump sync pipeline
 *
 * Every stage logs through its own child so a line can be traced to the step
 * that wrote it: `boot` (CLI and run summaries), `fetch` (provider calls),
 * `validate` (per-record rejections, entity counts) and `store` (merges and
 * transactions).
 *
 * Environment, read once at import:
 *   DUMPSYNC_LOG_LEVEL   explicit level, wins over everything else
 *   DUMPSYNC_DEBUG       any value other than "", "false" or "0" means debug
 *   DUMPSYNC_LOG_PRETTY  "true"/"false" forces pino-pretty on or off
 *
 * Without those: silent under Vitest, debug with pino-pretty in development,
 * info as JSON lines in production.
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Environment ────────────────────────────────────────────────

function isTestEnv(env: NodeJS.ProcessEnv): boolean {
  return env.NODE_ENV === "test" || env.VITEST === "true";
}

const IS_TEST = isTestEnv(process.env);
const IS_DEV = process.env.NODE_ENV !== "production" && !IS_TEST;

/** Level for a given environment; exported so it can be checked without a logger. */
export function resolveLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.DUMPSYNC_LOG_LEVEL) return env.DUMPSYNC_LOG_LEVEL;

  const debug = (env.DUMPSYNC_DEBUG ?? "").trim().toLowerCase();
  if (debug !== "" && debug !== "false" && debug !== "0") return "debug";

  if (isTestEnv(env)) return "silent";
  return env.NODE_ENV === "production" ? "info" : "debug";
}

/** pino-pretty in development unless turned off; plain JSON otherwise. */
function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (IS_TEST) return undefined;

  const wantPretty =
    process.env.DUMPSYNC_LOG_PRETTY === "true" ||
    (process.env.DUMPSYNC_LOG_PRETTY !== "false" && IS_DEV);

  if (wantPretty) {
    return {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss.l",
        ignore: "pid,hostname",
      },
    };
  }

  return undefined;
}

// ─── Root Logger ────────────────────────────────────────────────

const level = resolveLevel();
const transport = resolveTransport();

/** Severity label written next to pino's numeric level in JSON output. */
const PINO_TO_SEVERITY: Record<number, string> = {
  10: "DEBUG",    // trace
  20: "DEBUG",    // debug
  30: "INFO",     // info
  40: "WARNING",  // warn
  50: "ERROR",    // error
  60: "CRITICAL", // fatal
};

const SEVERITY_FORMAT = !IS_TEST && !transport;

export const rootLogger: Logger = pino({
  level,
  ...(transport ? { transport } : {}),
  ...(SEVERITY_FORMAT ? { messageKey: "message" } : {}),
  base: { service: "dumpsync" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    ...(SEVERITY_FORMAT
      ? {
          level(label: string, number: number) {
            return { severity: PINO_TO_SEVERITY[number] || label.toUpperCase(), level: number };
          },
        }
      : {}),
  },
  // The provider's client secret and bearer token must never reach a log line.
  redact: {
    paths: [
      "token", "*.token",
      "accessToken", "*.accessToken",
      "clientSecret", "*.clientSecret",
      "secret", "*.secret",
      "authorization", "*.authorization",
      "headers.Authorization",
    ],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  boot: rootLogger.child({ subsystem: "boot" }),
  fetch: rootLogger.child({ subsystem: "fetch" }),
  validate: rootLogger.child({ subsystem: "validate" }),
  store: rootLogger.child({ subsystem: "store" }),
  root: rootLogger,
};

export type { Logger };
