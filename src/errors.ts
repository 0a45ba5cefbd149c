/**
 * errors.ts — Stable error codes for the pipeline.
 *
 * Fatal conditions throw a PipelineError and abort the run before anything
 * persisted is touched. Recoverable conditions never throw; they travel as
 * `{ ok: false, code, reason }` results and are counted in the run stats.
 */

export const ErrorCode = {
  // Fatal: whole run aborts
  CONFIG_MISSING: "CONFIG_MISSING",
  CONFIG_INVALID: "CONFIG_INVALID",
  STORE_CORRUPT: "STORE_CORRUPT",
  TEMPLATE_MISSING: "TEMPLATE_MISSING",
  LOOKUP_INVALID: "LOOKUP_INVALID",
  // Recoverable: counted per source/row/record/artifact
  SOURCE_UNREADABLE: "SOURCE_UNREADABLE",
  MISSING_FIELD: "MISSING_FIELD",
  INVALID_TIMESTAMP: "INVALID_TIMESTAMP",
  KEY_UNDERIVABLE: "KEY_UNDERIVABLE",
  RENDER_FAILED: "RENDER_FAILED",
  ORPHAN_IO: "ORPHAN_IO",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export class PipelineError extends Error {
  readonly code: ErrorCodeValue;

  constructor(code: ErrorCodeValue, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

export function isPipelineError(err: unknown): err is PipelineError {
  return err instanceof PipelineError;
}

/** Render an unknown thrown value as a short reason string. */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
