#!/usr/bin/env tsx
/**
 * delayboard.ts — Command router.
 *
 * Thin command router. All logic lives in scripts/cli/ modules.
 * Every command returns a CliResult; the router emits it and exits.
 *
 * Usage:
 *   npx tsx scripts/delayboard.ts <command> [options]
 *   npm run delayboard -- <command> [options]
 *
 * Commands:
 *   run       Ingest sources, merge, regenerate and reconcile the site
 *   status    Store and artifact tree summary
 *   preview   Serve the generated site locally
 *
 * Options (run/status/preview):
 *   --historical <file>   Historical export (CSV/TSV/XLSX), repeatable
 *   --live <file>         Live-feed snapshot (JSON or CSV), repeatable
 *   --store <file>        Canonical store document
 *   --out <dir>           Artifact tree root
 *   --policy <name>       Orphan policy: delete | preserve | archive
 *   --link-template <url> Monetization link template
 *   --min-delay <min>     Minimum delay for a page
 *   --port <n>            Preview port
 */

import { resolve } from "node:path";
import { CONFIG_DEFAULTS, resolveConfig } from "../src/config.js";
import type { CliCommand } from "./cli/types.js";
import { emitResult, errorResult, makeResult, overridesFromArgs } from "./cli/runner.js";

import run from "./cli/run.js";
import status from "./cli/status.js";
import preview from "./cli/preview.js";

// ─── Command table ──────────────────────────────────────────────

const COMMANDS: Record<string, CliCommand> = {
  run:     run,
  status:  status,
  preview: preview,
};

// ─── Arg parsing ────────────────────────────────────────────────

const args = process.argv.slice(2);
const commandName = args[0] && !args[0].startsWith("--") ? args[0] : undefined;

function logsDirFor(argv: string[]): string {
  try {
    return resolveConfig(overridesFromArgs(argv)).logsDir;
  } catch {
    // Bad flags are reported by the command itself; results still land in ./logs
    return resolve(CONFIG_DEFAULTS.logsDir);
  }
}

// ─── Router ─────────────────────────────────────────────────────

async function main(): Promise<boolean> {
  // Help
  if (!commandName || commandName === "help" || commandName === "--help" || commandName === "-h") {
    const cmds = Object.values(COMMANDS).map(c => ({ name: c.name, description: c.description }));
    emitResult(makeResult("help", Date.now(), {
      commands: cmds,
      usage: "npm run delayboard -- <command> [options]",
    }));
    return true;
  }

  // Dispatch
  const cmd = COMMANDS[commandName];
  if (!cmd) {
    emitResult(makeResult("unknown", Date.now(), {}, {
      success: false,
      errors: [`Unknown command: ${commandName}`],
      hints: [`Valid commands: ${Object.keys(COMMANDS).join(", ")}`],
    }));
    return false;
  }

  const start = Date.now();
  const rest = args.slice(1);
  try {
    const result = await cmd.run(rest);
    emitResult(result, logsDirFor(rest));
    return result.success;
  } catch (err) {
    emitResult(errorResult(cmd.name, start, err), logsDirFor(rest));
    return false;
  }
}

main().then(
  (ok) => process.exit(ok ? 0 : 1),
  (err) => {
    emitResult(errorResult(commandName ?? "unknown", Date.now(), err));
    process.exit(1);
  },
);
