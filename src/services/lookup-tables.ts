/**
 * lookup-tables.ts — Static code → name and city → code tables.
 *
 * Loaded once from `data/*.json` and injected into the normalizer, so the
 * normalizer itself stays pure. A missing mapping is never an error: every
 * resolver falls back to passing the input through.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import { foldLookup } from "./text.js";

export interface LookupTables {
  /** Upper-case IATA/ICAO carrier code → display name. */
  readonly airlines: ReadonlyMap<string, string>;
  /** Upper-case airport code (ICAO or IATA) → city name. */
  readonly airports: ReadonlyMap<string, string>;
  /** Folded city name → location code. */
  readonly cities: ReadonlyMap<string, string>;
}

export interface RawLookupTables {
  airlines: Record<string, string>;
  airports: Record<string, string>;
  cities: Record<string, string>;
}

export const LOOKUP_FILES = {
  airlines: "airlines.json",
  airports: "airports.json",
  cities: "cities.json",
} as const;

export function createLookupTables(raw: Partial<RawLookupTables> = {}): LookupTables {
  const airlines = new Map<string, string>();
  for (const [code, name] of Object.entries(raw.airlines ?? {})) {
    airlines.set(code.trim().toUpperCase(), name);
  }
  const airports = new Map<string, string>();
  for (const [code, city] of Object.entries(raw.airports ?? {})) {
    airports.set(code.trim().toUpperCase(), city);
  }
  const cities = new Map<string, string>();
  for (const [city, code] of Object.entries(raw.cities ?? {})) {
    cities.set(foldLookup(city), code.trim().toUpperCase());
  }
  return { airlines, airports, cities };
}

function toStringRecord(value: unknown, file: string): Record<string, string> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new PipelineError(ErrorCode.LOOKUP_INVALID, `${file} must contain a JSON object`);
  }
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== "string") {
      throw new PipelineError(ErrorCode.LOOKUP_INVALID, `${file}: value for "${key}" must be a string`);
    }
    out[key] = entry;
  }
  return out;
}

async function readTable(dataDir: string, file: string): Promise<Record<string, string>> {
  const path = join(dataDir, file);
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new PipelineError(ErrorCode.LOOKUP_INVALID, `cannot read lookup table ${path}: ${describeError(err)}`, { cause: err });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new PipelineError(ErrorCode.LOOKUP_INVALID, `${file} is not valid JSON`, { cause: err });
  }
  return toStringRecord(parsed, file);
}

/** Load the three lookup tables from a data directory. */
export async function loadLookupTables(dataDir: string): Promise<LookupTables> {
  const [airlines, airports, cities] = await Promise.all([
    readTable(dataDir, LOOKUP_FILES.airlines),
    readTable(dataDir, LOOKUP_FILES.airports),
    readTable(dataDir, LOOKUP_FILES.cities),
  ]);
  const tables = createLookupTables({ airlines, airports, cities });
  log.ingest.debug(
    { airlines: tables.airlines.size, airports: tables.airports.size, cities: tables.cities.size },
    "lookup tables loaded",
  );
  return tables;
}

// ─── Resolvers ──────────────────────────────────────────────────

/** Carrier code or name → display name; unknown values pass through trimmed. */
export function resolveAirlineName(tables: LookupTables, raw: string): string {
  const value = raw.trim();
  return tables.airlines.get(value.toUpperCase()) ?? value;
}

/** Airport code → city; anything else (already a city name) passes through. */
export function resolveCity(tables: LookupTables, raw: string): string {
  const value = raw.trim();
  return tables.airports.get(value.toUpperCase()) ?? value;
}

/** City name → location code, or undefined when the city is not mapped. */
export function resolveLocationCode(tables: LookupTables, city: string): string | undefined {
  return tables.cities.get(foldLookup(city));
}

/**
 * Carrier code that prefixes a flight number ("G31234" → "G3"), longest
 * known code first. Used both to strip the prefix and to infer the airline
 * when the airline column is empty.
 */
export function matchCarrierPrefix(tables: LookupTables, flightNumber: string): string | undefined {
  const compact = flightNumber.replace(/\s+/g, "").toUpperCase();
  for (const length of [3, 2]) {
    if (compact.length <= length) continue;
    const candidate = compact.slice(0, length);
    // Three-letter ICAO codes only count when digits follow ("GLO1234", not "GOLD")
    if (tables.airlines.has(candidate) && /^\d/.test(compact.slice(length))) {
      return candidate;
    }
  }
  return undefined;
}
