/**
 * flight-types.ts — Canonical record, key, artifact and outcome types.
 *
 * Shared by every pipeline stage. Timestamps are local wall-clock strings
 * (`YYYY-MM-DDTHH:mm:ss`) because the upstream feeds carry no zone.
 */

import type { ErrorCode } from "../errors.js";

// ─── Enumerations ───────────────────────────────────────────────

export const FLIGHT_STATUSES = ["Scheduled", "Delayed", "Cancelled"] as const;
export type FlightStatus = (typeof FLIGHT_STATUSES)[number];

export const RECORD_SOURCES = ["LiveFeed", "HistoricalImport"] as const;
export type RecordSource = (typeof RECORD_SOURCES)[number];

/** `YYYY-MM-DDTHH:mm:ss`, no zone. */
export type Timestamp = string;

// ─── Canonical record ───────────────────────────────────────────

export interface FlightRecord {
  readonly airlineName: string;
  readonly flightNumber: string;
  readonly origin: string;
  readonly destination: string;
  /** Location code; omitted when the destination city is not in the lookup. */
  readonly destinationCode?: string;
  readonly status: FlightStatus;
  readonly scheduledAt: Timestamp;
  readonly actualAt: Timestamp | null;
  readonly delayMinutes: number;
  readonly source: RecordSource;
  /** ISO-8601 instant the source last reported this record. */
  readonly observedAt: string;
}

// ─── Identity ───────────────────────────────────────────────────

export interface CanonicalKey {
  readonly airline: string;
  readonly flightNumber: string;
  /** `YYYY-MM-DD` */
  readonly date: string;
}

/** `AIRLINE|NUMBER|DATE`, the string form used for maps and ordering. */
export type CanonicalKeyString = string;

// ─── Artifacts & outcomes ───────────────────────────────────────

export interface ArtifactRef {
  readonly key: CanonicalKeyString;
  readonly slug: string;
  /** Relative to the artifact tree root, forward slashes. */
  readonly path: string;
}

export type SkipReason = "not_eligible" | "incomplete_record";

export type GenerationOutcome =
  | { readonly kind: "rendered"; readonly key: CanonicalKeyString; readonly artifact: ArtifactRef }
  | { readonly kind: "skipped"; readonly key: CanonicalKeyString; readonly reason: SkipReason }
  | {
    readonly kind: "failed";
    readonly key: CanonicalKeyString;
    readonly code: typeof ErrorCode.RENDER_FAILED;
    readonly reason: string;
  };

/** Per-record render state machine. Terminal states are final for the run. */
export type RenderState = "pending" | "rendering" | "rendered" | "skipped" | "failed";

export const ORPHAN_POLICIES = ["delete", "preserve", "archive"] as const;
export type OrphanPolicy = (typeof ORPHAN_POLICIES)[number];

// ─── Raw rows (fetcher boundary) ────────────────────────────────

interface RawRowBase {
  /** Column name → cell text, exactly as the source delivered it. */
  readonly columns: Readonly<Record<string, string>>;
  /** Where the row came from, for failure reports (`file.csv:42`). */
  readonly position: string;
  /** ISO instant the fetcher materialized this row. */
  readonly observedAt: string;
}

export interface LiveFeedRow extends RawRowBase {
  readonly source: "LiveFeed";
}

export interface HistoricalImportRow extends RawRowBase {
  readonly source: "HistoricalImport";
}

export type RawRow = LiveFeedRow | HistoricalImportRow;
