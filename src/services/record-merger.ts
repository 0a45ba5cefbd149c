/**
 * record-merger.ts — First-writer-wins merge into the canonical store.
 *
 * One exception to first-writer-wins, named so it is visible and testable:
 * LIVE_OVERRIDES_HISTORICAL. Everything else that collides is a duplicate.
 * The input snapshot is never mutated.
 */

import { ErrorCode, PipelineError } from "../errors.js";
import type { CanonicalKeyString, FlightRecord, RecordSource } from "../types/flight-types.js";
import { compareKeys, deriveKey, keyToString } from "./canonical-key.js";

// ─── Store snapshot ─────────────────────────────────────────────

export interface StoreMetadata {
  /** ISO instant of the merge that produced this snapshot; null for a fresh store. */
  readonly lastMergeAt: string | null;
  readonly sourceCounts: Readonly<Record<RecordSource, number>>;
  readonly totalFlights: number;
}

export interface FlightStoreSnapshot {
  /** Ordered by canonical key. */
  readonly flights: readonly FlightRecord[];
  readonly metadata: StoreMetadata;
}

export function emptySnapshot(): FlightStoreSnapshot {
  return {
    flights: [],
    metadata: { lastMergeAt: null, sourceCounts: { LiveFeed: 0, HistoricalImport: 0 }, totalFlights: 0 },
  };
}

export function countSources(flights: readonly FlightRecord[]): Record<RecordSource, number> {
  const counts: Record<RecordSource, number> = { LiveFeed: 0, HistoricalImport: 0 };
  for (const flight of flights) counts[flight.source] += 1;
  return counts;
}

// ─── Priority rule ──────────────────────────────────────────────

export interface MergeRule {
  readonly name: string;
  /** True when `incoming` must replace `existing` under the same key. */
  readonly replaces: (existing: FlightRecord, incoming: FlightRecord) => boolean;
}

export const LIVE_OVERRIDES_HISTORICAL: MergeRule = {
  name: "LIVE_OVERRIDES_HISTORICAL",
  replaces: (existing, incoming) => existing.source === "HistoricalImport" && incoming.source === "LiveFeed",
};

// ─── Merge ──────────────────────────────────────────────────────

export interface MergeStats {
  imported: number;
  upgraded: number;
  duplicates: number;
  errors: number;
}

export interface KeyFailure {
  record: FlightRecord;
  reason: string;
}

export interface MergeResult {
  store: FlightStoreSnapshot;
  stats: MergeStats;
  keyFailures: KeyFailure[];
}

export interface MergeOptions {
  /** Stamped into `metadata.lastMergeAt`. */
  mergedAt: string;
  rule?: MergeRule;
}

/**
 * Merge `incoming` into `store`. Records whose key cannot be derived are
 * counted in `stats.errors` and returned, never thrown.
 */
export function mergeRecords(
  store: FlightStoreSnapshot,
  incoming: Iterable<FlightRecord>,
  options: MergeOptions,
): MergeResult {
  const rule = options.rule ?? LIVE_OVERRIDES_HISTORICAL;
  const byKey = new Map<CanonicalKeyString, FlightRecord>();

  for (const flight of store.flights) {
    const derived = deriveKey(flight);
    if (!derived.ok) {
      throw new PipelineError(ErrorCode.STORE_CORRUPT, `stored flight has no canonical key: ${derived.reason}`);
    }
    byKey.set(keyToString(derived.key), flight);
  }

  const stats: MergeStats = { imported: 0, upgraded: 0, duplicates: 0, errors: 0 };
  const keyFailures: KeyFailure[] = [];

  for (const record of incoming) {
    const derived = deriveKey(record);
    if (!derived.ok) {
      stats.errors += 1;
      keyFailures.push({ record, reason: derived.reason });
      continue;
    }

    const key = keyToString(derived.key);
    const existing = byKey.get(key);
    if (!existing) {
      byKey.set(key, record);
      stats.imported += 1;
    } else if (rule.replaces(existing, record)) {
      byKey.set(key, record);
      stats.upgraded += 1;
    } else {
      stats.duplicates += 1;
    }
  }

  const flights = [...byKey.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([, flight]) => flight);

  return {
    store: {
      flights,
      metadata: {
        lastMergeAt: options.mergedAt,
        sourceCounts: countSources(flights),
        totalFlights: flights.length,
      },
    },
    stats,
    keyFailures,
  };
}
