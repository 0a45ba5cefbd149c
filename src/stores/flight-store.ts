/**
 * flight-store.ts — Canonical store persistence (JSON document)
 *
 * Document shape:
 *   { "flights": StoredFlight[], "metadata": { lastMergeAt, sourceCounts, totalFlights } }
 *
 * Flights are stored snake_case. An absent or empty file is an empty store;
 * anything unparseable or structurally wrong is STORE_CORRUPT and the run
 * aborts before mutating anything.
 */

import { readFile } from "node:fs/promises";
import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import { countSources, emptySnapshot, type FlightStoreSnapshot } from "../services/record-merger.js";
import { deriveKey, keyToString } from "../services/canonical-key.js";
import {
  FLIGHT_STATUSES,
  RECORD_SOURCES,
  type FlightRecord,
  type FlightStatus,
  type RecordSource,
} from "../types/flight-types.js";
import { writeFileAtomic } from "./artifact-tree.js";

// ─── Store Interface ────────────────────────────────────────────

export interface FlightStore {
  load(): Promise<FlightStoreSnapshot>;
  /** Replace the stored snapshot atomically. */
  save(snapshot: FlightStoreSnapshot): Promise<void>;
  /** Where the store lives, for logs and CLI output. */
  describe(): string;
}

// ─── Wire Form ──────────────────────────────────────────────────

export interface StoredFlight {
  key: string;
  airline_name: string;
  flight_number: string;
  origin: string;
  destination: string;
  destination_code?: string;
  status: FlightStatus;
  scheduled_at: string;
  actual_at: string | null;
  delay_minutes: number;
  source: RecordSource;
  observed_at: string;
}

export function toStoredFlight(record: FlightRecord): StoredFlight {
  const derived = deriveKey(record);
  if (!derived.ok) {
    throw new PipelineError(ErrorCode.KEY_UNDERIVABLE, `cannot store flight without a key: ${derived.reason}`);
  }
  return {
    key: keyToString(derived.key),
    airline_name: record.airlineName,
    flight_number: record.flightNumber,
    origin: record.origin,
    destination: record.destination,
    ...(record.destinationCode ? { destination_code: record.destinationCode } : {}),
    status: record.status,
    scheduled_at: record.scheduledAt,
    actual_at: record.actualAt,
    delay_minutes: record.delayMinutes,
    source: record.source,
    observed_at: record.observedAt,
  };
}

const TIMESTAMP = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function text(row: Fields, field: string, at: string): string {
  const value = row[field];
  if (typeof value !== "string") {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "${field}" must be a string`);
  }
  return value;
}

function oneOf<T extends string>(allowed: readonly T[], value: string, field: string, at: string): T {
  const hit = allowed.find((candidate) => candidate === value);
  if (hit === undefined) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "${field}" has unknown value "${value}"`);
  }
  return hit;
}

/** Validate one stored row back into a record. */
export function fromStoredFlight(value: unknown, at: string): FlightRecord {
  if (!isFields(value)) throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: flight must be an object`);

  const scheduledAt = text(value, "scheduled_at", at);
  if (!TIMESTAMP.test(scheduledAt)) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "scheduled_at" is not a timestamp`);
  }
  const actualRaw = value.actual_at;
  if (actualRaw !== null && actualRaw !== undefined && (typeof actualRaw !== "string" || !TIMESTAMP.test(actualRaw))) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "actual_at" is not a timestamp`);
  }
  const delay = value.delay_minutes;
  if (typeof delay !== "number" || !Number.isInteger(delay) || delay < 0) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "delay_minutes" must be a non-negative integer`);
  }
  const destinationCode = value.destination_code;
  if (destinationCode !== undefined && typeof destinationCode !== "string") {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${at}: "destination_code" must be a string`);
  }

  return {
    airlineName: text(value, "airline_name", at),
    flightNumber: text(value, "flight_number", at),
    origin: text(value, "origin", at),
    destination: text(value, "destination", at),
    ...(destinationCode ? { destinationCode } : {}),
    status: oneOf(FLIGHT_STATUSES, text(value, "status", at), "status", at),
    scheduledAt,
    actualAt: typeof actualRaw === "string" ? actualRaw : null,
    delayMinutes: delay,
    source: oneOf(RECORD_SOURCES, text(value, "source", at), "source", at),
    observedAt: text(value, "observed_at", at),
  };
}

/** Parse a whole store document. */
export function parseStoreDocument(raw: string, origin: string): FlightStoreSnapshot {
  if (raw.trim() === "") return emptySnapshot();

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${origin} is not valid JSON: ${describeError(err)}`, { cause: err });
  }
  if (!isFields(parsed) || !Array.isArray(parsed.flights)) {
    throw new PipelineError(ErrorCode.STORE_CORRUPT, `${origin} must be an object with a "flights" array`);
  }

  const flights = parsed.flights.map((row: unknown, i: number) => fromStoredFlight(row, `${origin} flights[${i}]`));
  const lastMergeAt = isFields(parsed.metadata) && typeof parsed.metadata.lastMergeAt === "string"
    ? parsed.metadata.lastMergeAt
    : null;

  return {
    flights,
    metadata: { lastMergeAt, sourceCounts: countSources(flights), totalFlights: flights.length },
  };
}

export function serializeStoreDocument(snapshot: FlightStoreSnapshot): string {
  const doc = {
    flights: snapshot.flights.map(toStoredFlight),
    metadata: snapshot.metadata,
  };
  return `${JSON.stringify(doc, null, 2)}\n`;
}

// ─── JSON File Store ────────────────────────────────────────────

export class JsonFlightStore implements FlightStore {
  constructor(readonly path: string) {}

  async load(): Promise<FlightStoreSnapshot> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf-8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        log.store.info({ path: this.path }, "store absent, starting empty");
        return emptySnapshot();
      }
      throw new PipelineError(ErrorCode.STORE_CORRUPT, `cannot read store ${this.path}: ${describeError(err)}`, { cause: err });
    }
    const snapshot = parseStoreDocument(raw, this.path);
    log.store.debug({ path: this.path, flights: snapshot.flights.length }, "store loaded");
    return snapshot;
  }

  async save(snapshot: FlightStoreSnapshot): Promise<void> {
    await writeFileAtomic(this.path, serializeStoreDocument(snapshot));
    log.store.info({ path: this.path, flights: snapshot.flights.length }, "store saved");
  }

  describe(): string {
    return `json:${this.path}`;
  }
}
