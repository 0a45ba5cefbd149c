/**
 * config.ts — Unified Configuration Resolution
 *
 * Single source of truth for all configuration. Priority chain:
 *   1. CLI flag override             ← highest
 *   2. Environment variable (DELAYBOARD_*)
 *   3. Default                       ← lowest
 *
 * Rules:
 * - All configuration resolves through `resolveConfig()`
 * - No `process.env` reads outside this file (except logger bootstrap)
 * - Invalid values abort with CONFIG_INVALID; a missing link template is
 *   not rejected here, the render gate owns that check
 */

import { resolve } from "node:path";
import { ErrorCode, PipelineError } from "./errors.js";
import { resolveLogLevel, resolveLogPretty } from "./logger.js";
import { ORPHAN_POLICIES, type OrphanPolicy } from "./types/flight-types.js";

// ─── Configuration Interface ────────────────────────────────────

export interface AppConfig {
  // ── Paths ───────────────────────────────────────────────────
  /** Canonical store JSON document */
  storePath: string;
  /** Artifact tree root (the generated site) */
  outputDir: string;
  /** Where archived orphans are moved */
  archiveDir: string;
  templatesDir: string;
  /** Lookup tables (airlines, airports, cities) */
  dataDir: string;
  /** Run results (last-run.json, runs.ndjson) */
  logsDir: string;

  // ── Site ────────────────────────────────────────────────────
  baseUrl: string;
  /** Custom domain written to CNAME; empty → no CNAME */
  siteDomain: string;
  /** Monetization link template; required by the render gate */
  linkTemplate: string | undefined;

  // ── Pipeline ────────────────────────────────────────────────
  minDelayMinutes: number;
  orphanPolicy: OrphanPolicy;
  indexPreservedOrphans: boolean;
  homepageSize: number;
  renderConcurrency: number;
  /** Origin for live rows that carry none */
  defaultOrigin: string;

  // ── Storage ─────────────────────────────────────────────────
  /** When set, the canonical store lives in Postgres instead of the JSON file */
  databaseUrl: string | undefined;

  // ── Preview ─────────────────────────────────────────────────
  previewPort: number;

  // ── Logging ─────────────────────────────────────────────────
  logLevel: string;
  logPretty: boolean;
}

/** Values a caller (CLI flags, tests) may force. */
export type ConfigOverrides = Partial<Omit<AppConfig, "logLevel" | "logPretty">>;

export const CONFIG_DEFAULTS = {
  storePath: "data/flights-db.json",
  outputDir: "docs",
  archiveDir: "archive",
  templatesDir: "templates",
  dataDir: "data",
  logsDir: "logs",
  baseUrl: "http://localhost:8080",
  siteDomain: "",
  minDelayMinutes: 15,
  orphanPolicy: "preserve",
  indexPreservedOrphans: false,
  homepageSize: 20,
  renderConcurrency: 4,
  defaultOrigin: "GRU",
  previewPort: 8080,
} as const satisfies Partial<AppConfig>;

// ─── Resolution Helpers ─────────────────────────────────────────

function env(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === "" ? undefined : value.trim();
}

function parseInteger(name: string, raw: string | undefined, fallback: number, min: number): number {
  if (raw === undefined) return fallback;
  if (!/^-?\d+$/.test(raw)) {
    throw new PipelineError(ErrorCode.CONFIG_INVALID, `${name} must be an integer, got "${raw}"`);
  }
  const value = Number.parseInt(raw, 10);
  if (value < min) {
    throw new PipelineError(ErrorCode.CONFIG_INVALID, `${name} must be >= ${min}, got ${value}`);
  }
  return value;
}

function parseBoolean(name: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined) return fallback;
  const folded = raw.toLowerCase();
  if (["true", "1", "yes"].includes(folded)) return true;
  if (["false", "0", "no"].includes(folded)) return false;
  throw new PipelineError(ErrorCode.CONFIG_INVALID, `${name} must be true or false, got "${raw}"`);
}

export function parseOrphanPolicy(raw: string): OrphanPolicy {
  const policy = ORPHAN_POLICIES.find((p) => p === raw.trim().toLowerCase());
  if (!policy) {
    throw new PipelineError(
      ErrorCode.CONFIG_INVALID,
      `orphan policy must be one of ${ORPHAN_POLICIES.join(", ")}, got "${raw}"`,
    );
  }
  return policy;
}

function checkRange(name: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new PipelineError(ErrorCode.CONFIG_INVALID, `${name} must be an integer >= ${min}, got ${value}`);
  }
  return value;
}

// ─── Main Resolution Function ───────────────────────────────────

/**
 * Resolve complete configuration. Relative paths resolve against the
 * working directory.
 */
export function resolveConfig(overrides: ConfigOverrides = {}): AppConfig {
  const nodeEnv = process.env.NODE_ENV || "development";
  const isTest = nodeEnv === "test" || process.env.VITEST === "true";
  const isDev = nodeEnv !== "production" && !isTest;

  const path = (override: string | undefined, envName: string, fallback: string) =>
    resolve(override ?? env(envName) ?? fallback);

  const orphanPolicy = overrides.orphanPolicy
    ?? parseOrphanPolicy(env("DELAYBOARD_ORPHAN_POLICY") ?? CONFIG_DEFAULTS.orphanPolicy);

  return {
    storePath: path(overrides.storePath, "DELAYBOARD_STORE_PATH", CONFIG_DEFAULTS.storePath),
    outputDir: path(overrides.outputDir, "DELAYBOARD_OUTPUT_DIR", CONFIG_DEFAULTS.outputDir),
    archiveDir: path(overrides.archiveDir, "DELAYBOARD_ARCHIVE_DIR", CONFIG_DEFAULTS.archiveDir),
    templatesDir: path(overrides.templatesDir, "DELAYBOARD_TEMPLATES_DIR", CONFIG_DEFAULTS.templatesDir),
    dataDir: path(overrides.dataDir, "DELAYBOARD_DATA_DIR", CONFIG_DEFAULTS.dataDir),
    logsDir: path(overrides.logsDir, "DELAYBOARD_LOGS_DIR", CONFIG_DEFAULTS.logsDir),

    baseUrl: overrides.baseUrl ?? env("DELAYBOARD_BASE_URL") ?? CONFIG_DEFAULTS.baseUrl,
    siteDomain: overrides.siteDomain ?? env("DELAYBOARD_SITE_DOMAIN") ?? CONFIG_DEFAULTS.siteDomain,
    linkTemplate: overrides.linkTemplate ?? env("DELAYBOARD_LINK_TEMPLATE"),

    minDelayMinutes: checkRange("minDelayMinutes", overrides.minDelayMinutes
      ?? parseInteger("DELAYBOARD_MIN_DELAY_MINUTES", env("DELAYBOARD_MIN_DELAY_MINUTES"), CONFIG_DEFAULTS.minDelayMinutes, 0), 0),
    orphanPolicy,
    indexPreservedOrphans: overrides.indexPreservedOrphans
      ?? parseBoolean("DELAYBOARD_INDEX_PRESERVED_ORPHANS", env("DELAYBOARD_INDEX_PRESERVED_ORPHANS"), CONFIG_DEFAULTS.indexPreservedOrphans),
    homepageSize: checkRange("homepageSize", overrides.homepageSize
      ?? parseInteger("DELAYBOARD_HOMEPAGE_SIZE", env("DELAYBOARD_HOMEPAGE_SIZE"), CONFIG_DEFAULTS.homepageSize, 0), 0),
    renderConcurrency: checkRange("renderConcurrency", overrides.renderConcurrency
      ?? parseInteger("DELAYBOARD_RENDER_CONCURRENCY", env("DELAYBOARD_RENDER_CONCURRENCY"), CONFIG_DEFAULTS.renderConcurrency, 1), 1),
    defaultOrigin: overrides.defaultOrigin ?? env("DELAYBOARD_DEFAULT_ORIGIN") ?? CONFIG_DEFAULTS.defaultOrigin,

    // Env-only fallback keeps the conventional name
    databaseUrl: overrides.databaseUrl ?? env("DELAYBOARD_DATABASE_URL") ?? env("DATABASE_URL"),

    previewPort: checkRange("previewPort", overrides.previewPort
      ?? parseInteger("DELAYBOARD_PREVIEW_PORT", env("DELAYBOARD_PREVIEW_PORT") ?? env("PORT"), CONFIG_DEFAULTS.previewPort, 0), 0),

    logLevel: resolveLogLevel(isTest, isDev),
    logPretty: resolveLogPretty(isTest, isDev),
  };
}
