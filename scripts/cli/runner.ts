/**
 * cli/runner.ts — Shared plumbing for delayboard commands.
 *
 * Result construction, result emission and arg helpers. Commands import
 * from here, never from each other.
 */

import { appendFileSync, mkdirSync, writeFileSync } from "node:fs";
import { join, resolve } from "node:path";
import { CONFIG_DEFAULTS, parseOrphanPolicy, type ConfigOverrides } from "../../src/config.js";
import { describeError, isPipelineError } from "../../src/errors.js";
import { log } from "../../src/logger.js";
import type { CliResult } from "./types.js";

// ─── Arg helpers ────────────────────────────────────────────────

/** Extract a --name=value flag from args. */
export function getFlag(args: string[], name: string): string | undefined {
  const flag = args.find(a => a.startsWith(`--${name}=`));
  if (flag) return flag.split("=").slice(1).join("=");

  const exactIndex = args.findIndex(a => a === `--${name}`);
  if (exactIndex >= 0) {
    const next = args[exactIndex + 1];
    if (next && !next.startsWith("--")) return next;
  }

  return undefined;
}

/** Every value of a repeatable --name flag, in order. */
export function getFlags(args: string[], name: string): string[] {
  const values: string[] = [];
  args.forEach((arg, i) => {
    if (arg.startsWith(`--${name}=`)) {
      values.push(arg.slice(name.length + 3));
    } else if (arg === `--${name}`) {
      const next = args[i + 1];
      if (next && !next.startsWith("--")) values.push(next);
    }
  });
  return values;
}

/** Check for a boolean --name flag in args. */
export function hasFlag(args: string[], name: string): boolean {
  return args.includes(`--${name}`);
}

function numberFlag(args: string[], name: string): number | undefined {
  const raw = getFlag(args, name);
  return raw === undefined ? undefined : Number(raw);
}

/** CLI flags → config overrides (highest priority in resolveConfig). */
export function overridesFromArgs(args: string[]): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  const set = <K extends keyof ConfigOverrides>(key: K, value: ConfigOverrides[K] | undefined) => {
    if (value !== undefined) overrides[key] = value;
  };

  set("storePath", getFlag(args, "store"));
  set("outputDir", getFlag(args, "out"));
  set("archiveDir", getFlag(args, "archive"));
  set("templatesDir", getFlag(args, "templates"));
  set("dataDir", getFlag(args, "data"));
  set("logsDir", getFlag(args, "logs"));
  set("baseUrl", getFlag(args, "base-url"));
  set("siteDomain", getFlag(args, "domain"));
  set("linkTemplate", getFlag(args, "link-template"));
  set("defaultOrigin", getFlag(args, "origin"));
  set("minDelayMinutes", numberFlag(args, "min-delay"));
  set("homepageSize", numberFlag(args, "homepage-size"));
  set("renderConcurrency", numberFlag(args, "concurrency"));
  set("previewPort", numberFlag(args, "port"));
  const policy = getFlag(args, "policy");
  if (policy !== undefined) overrides.orphanPolicy = parseOrphanPolicy(policy);
  if (hasFlag(args, "index-preserved")) overrides.indexPreservedOrphans = true;

  return overrides;
}

// ─── Result construction ────────────────────────────────────────

/** Build a CliResult without emitting it. */
export function makeResult(
  cmd: string,
  start: number,
  data: Record<string, unknown>,
  opts?: { success?: boolean; errors?: string[]; hints?: string[] },
): CliResult {
  const result: CliResult = {
    command: `delayboard:${cmd}`,
    success: opts?.success ?? true,
    timestamp: new Date().toISOString(),
    durationMs: Date.now() - start,
    data,
  };
  if (opts?.errors?.length) result.errors = opts.errors;
  if (opts?.hints?.length) result.hints = opts.hints;
  return result;
}

/** Failure result for a thrown error; pipeline errors carry their code. */
export function errorResult(cmd: string, start: number, err: unknown): CliResult {
  const message = isPipelineError(err) ? `${err.code}: ${err.message}` : describeError(err);
  return makeResult(cmd, start, {}, { success: false, errors: [message] });
}

// ─── Result emission ────────────────────────────────────────────

/** Emit result to stdout (JSON) and persist to disk. */
export function emitResult(result: CliResult, logsDir = resolve(CONFIG_DEFAULTS.logsDir)): void {
  console.log(JSON.stringify(result, null, 2));
  try {
    mkdirSync(logsDir, { recursive: true });
    writeFileSync(join(logsDir, "last-run.json"), JSON.stringify(result, null, 2) + "\n");
    appendFileSync(join(logsDir, "runs.ndjson"), JSON.stringify(result) + "\n");
  } catch (err) {
    // Persisting the result never changes the command's outcome
    log.boot.warn({ logsDir, reason: describeError(err) }, "run result not persisted");
  }
}
