/**
 * types.ts — Source fetcher contract.
 *
 * Fetchers materialize raw rows; they never normalize. Retry and backoff,
 * where a source needs them, live here and not in the core.
 */

import type { RawRow, RecordSource } from "../types/flight-types.js";

export interface SourceFetcher {
  readonly source: RecordSource;
  /** Rows of one source location (a file path). */
  fetchRaw(location: string): AsyncIterable<RawRow>;
}

export interface FetcherOptions {
  /** Clock used to stamp `observedAt`; injected so tests are deterministic. */
  now?: () => Date;
}

export function makeRow(
  source: RecordSource,
  columns: Record<string, string>,
  position: string,
  observedAt: string,
): RawRow {
  return { source, columns, position, observedAt };
}
