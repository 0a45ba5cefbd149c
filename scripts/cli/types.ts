/**
 * cli/types.ts — Shared type contracts for the delayboard command set.
 *
 * Every command returns a CliResult. The router emits it (stdout JSON)
 * and persists it (logs/last-run.json + logs/runs.ndjson).
 */

/** Structured result returned by every command. */
export interface CliResult {
  command: string;
  success: boolean;
  timestamp: string;
  durationMs: number;
  data: Record<string, unknown>;
  errors?: string[];
  hints?: string[];
}

/** Registerable command. */
export interface CliCommand {
  name: string;
  description: string;
  run: (args: string[]) => Promise<CliResult>;
}
