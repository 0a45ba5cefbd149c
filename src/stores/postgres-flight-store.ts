/**
 * postgres-flight-store.ts — Canonical store mirrored in PostgreSQL
 *
 * Same FlightStore contract as the JSON document. `save` replaces the whole
 * table inside one transaction (upsert every flight, delete the keys that
 * are gone), so a reader never sees a half-written snapshot.
 *
 * Selected by the CLI when DATABASE_URL / DELAYBOARD_DATABASE_URL is set.
 */

import { initSchema, withTransaction, type Queryable } from "../db.js";
import { log } from "../logger.js";
import { countSources, type FlightStoreSnapshot } from "../services/record-merger.js";
import { fromStoredFlight, toStoredFlight, type FlightStore } from "./flight-store.js";

// ═══════════════════════════════════════════════════════════
// Schema DDL
// ═══════════════════════════════════════════════════════════

const SCHEMA_STATEMENTS = [
  `CREATE TABLE IF NOT EXISTS flights (
    key TEXT PRIMARY KEY,
    airline_name TEXT NOT NULL,
    flight_number TEXT NOT NULL,
    origin TEXT NOT NULL,
    destination TEXT NOT NULL,
    destination_code TEXT,
    status TEXT NOT NULL CHECK (status IN ('Scheduled', 'Delayed', 'Cancelled')),
    scheduled_at TEXT NOT NULL,
    actual_at TEXT,
    delay_minutes INTEGER NOT NULL CHECK (delay_minutes >= 0),
    source TEXT NOT NULL CHECK (source IN ('LiveFeed', 'HistoricalImport')),
    observed_at TEXT NOT NULL
  )`,
  `CREATE INDEX IF NOT EXISTS idx_flights_observed ON flights(observed_at DESC)`,
  `CREATE TABLE IF NOT EXISTS store_metadata (
    id INTEGER PRIMARY KEY CHECK (id = 1),
    last_merge_at TEXT
  )`,
];

// ═══════════════════════════════════════════════════════════
// SQL Fragments
// ═══════════════════════════════════════════════════════════

const FLIGHT_COLS = `key, airline_name, flight_number, origin, destination, destination_code,
  status, scheduled_at, actual_at, delay_minutes, source, observed_at`;

const UPSERT_FLIGHT = `INSERT INTO flights (${FLIGHT_COLS})
  VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
  ON CONFLICT (key) DO UPDATE SET
    airline_name = EXCLUDED.airline_name,
    flight_number = EXCLUDED.flight_number,
    origin = EXCLUDED.origin,
    destination = EXCLUDED.destination,
    destination_code = EXCLUDED.destination_code,
    status = EXCLUDED.status,
    scheduled_at = EXCLUDED.scheduled_at,
    actual_at = EXCLUDED.actual_at,
    delay_minutes = EXCLUDED.delay_minutes,
    source = EXCLUDED.source,
    observed_at = EXCLUDED.observed_at`;

// ═══════════════════════════════════════════════════════════
// Implementation
// ═══════════════════════════════════════════════════════════

/** Postgres returns NULL columns as null; the wire form omits an absent code. */
function withoutNulls(row: Record<string, unknown>): Record<string, unknown> {
  const { destination_code: code, ...rest } = row;
  return code === null ? rest : { ...rest, destination_code: code };
}

export class PostgresFlightStore implements FlightStore {
  constructor(private readonly pool: Queryable) {}

  async initSchema(): Promise<void> {
    await initSchema(this.pool, SCHEMA_STATEMENTS);
    log.store.debug("flight store schema ready");
  }

  async load(): Promise<FlightStoreSnapshot> {
    const flights = await this.pool.query<Record<string, unknown>>(`SELECT ${FLIGHT_COLS} FROM flights ORDER BY key`);
    const meta = await this.pool.query<{ last_merge_at: string | null }>(
      `SELECT last_merge_at FROM store_metadata WHERE id = 1`,
    );
    const records = flights.rows.map((row, i) => fromStoredFlight(withoutNulls(row), `flights row ${i}`));
    log.store.debug({ flights: records.length }, "store loaded from postgres");
    return {
      flights: records,
      metadata: {
        lastMergeAt: meta.rows[0]?.last_merge_at ?? null,
        sourceCounts: countSources(records),
        totalFlights: records.length,
      },
    };
  }

  async save(snapshot: FlightStoreSnapshot): Promise<void> {
    const stored = snapshot.flights.map(toStoredFlight);
    await withTransaction(this.pool, async (client) => {
      for (const f of stored) {
        await client.query(UPSERT_FLIGHT, [
          f.key, f.airline_name, f.flight_number, f.origin, f.destination, f.destination_code ?? null,
          f.status, f.scheduled_at, f.actual_at, f.delay_minutes, f.source, f.observed_at,
        ]);
      }
      await client.query(`DELETE FROM flights WHERE NOT (key = ANY($1::text[]))`, [stored.map((f) => f.key)]);
      await client.query(
        `INSERT INTO store_metadata (id, last_merge_at) VALUES (1, $1)
         ON CONFLICT (id) DO UPDATE SET last_merge_at = EXCLUDED.last_merge_at`,
        [snapshot.metadata.lastMergeAt],
      );
    });
    log.store.info({ flights: stored.length }, "store saved to postgres");
  }

  describe(): string {
    return "postgres:flights";
  }
}
