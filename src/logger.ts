/**
 * logger.ts — Structured Logging for Delayboard
 *
 * Built on pino.
 *
 * Configuration:
 *   DELAYBOARD_LOG_LEVEL  — Minimum log level (default: "info", dev: "debug")
 *   DELAYBOARD_LOG_PRETTY — Force pretty-print (auto-detected from NODE_ENV)
 *   DELAYBOARD_DEBUG      — "true" sets level to "debug"
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.merge.info({ imported: 12 }, "merge complete");
 *   log.render.warn({ key, reason }, "render failed");
 *
 * Subsystem loggers:
 *   log.boot, log.ingest, log.merge, log.render, log.reconcile, log.index, log.store, log.http
 */

import pino from "pino";
import type { Logger } from "pino";

// ─── Configuration ──────────────────────────────────────────────

const IS_TEST = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const IS_DEV = process.env.NODE_ENV !== "production" && !IS_TEST;

/** Resolve log level from environment */
export function resolveLogLevel(isTest = IS_TEST, isDev = IS_DEV): string {
  if (process.env.DELAYBOARD_LOG_LEVEL) {
    return process.env.DELAYBOARD_LOG_LEVEL;
  }
  const debugEnv = (process.env.DELAYBOARD_DEBUG || "").trim().toLowerCase();
  if (debugEnv && debugEnv !== "false" && debugEnv !== "0") {
    return "debug";
  }
  // Silent in tests, debug in dev, info in prod
  if (isTest) return "silent";
  if (isDev) return "debug";
  return "info";
}

/** Whether to pretty-print log lines */
export function resolveLogPretty(isTest = IS_TEST, isDev = IS_DEV): boolean {
  if (isTest) return false;
  return (
    process.env.DELAYBOARD_LOG_PRETTY === "true" ||
    (process.env.DELAYBOARD_LOG_PRETTY !== "false" && isDev)
  );
}

function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (!resolveLogPretty()) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

// ─── Root Logger ────────────────────────────────────────────────

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLogLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "delayboard" },
  timestamp: pino.stdTimeFunctions.isoTime,
  // Link templates may carry partner tokens in their query string
  redact: {
    paths: ["linkTemplate", "*.linkTemplate", "databaseUrl", "*.databaseUrl"],
    censor: "[REDACTED]",
  },
});

// ─── Subsystem Child Loggers ────────────────────────────────────

export const log = {
  /** CLI startup and config resolution */
  boot: rootLogger.child({ subsystem: "boot" }),
  /** Source fetchers and row normalization */
  ingest: rootLogger.child({ subsystem: "ingest" }),
  /** Canonical store merge */
  merge: rootLogger.child({ subsystem: "merge" }),
  /** Per-record page rendering */
  render: rootLogger.child({ subsystem: "render" }),
  /** Orphan reconciliation */
  reconcile: rootLogger.child({ subsystem: "reconcile" }),
  /** Sitemap, homepage and listings */
  index: rootLogger.child({ subsystem: "index" }),
  /** Store and artifact tree persistence */
  store: rootLogger.child({ subsystem: "store" }),
  /** Preview server */
  http: rootLogger.child({ subsystem: "http" }),
  root: rootLogger,
};

export type { Logger };
