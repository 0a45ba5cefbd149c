/**
 * field-normalizer.ts — Raw feed rows → canonical FlightRecord.
 *
 * Column identification is synonym-based per source variant, so upstream
 * header drift ("Número Voo" → "Numero do Voo") needs no code change.
 * Pure: lookups are injected, no clock reads, failures are returned.
 */

import { ErrorCode } from "../errors.js";
import type {
  FlightRecord,
  FlightStatus,
  RawRow,
  RecordSource,
  Timestamp,
} from "../types/flight-types.js";
import {
  matchCarrierPrefix,
  resolveAirlineName,
  resolveCity,
  resolveLocationCode,
  type LookupTables,
} from "./lookup-tables.js";
import { foldLookup, normalizeHeader } from "./text.js";
import {
  addDays,
  datePart,
  parseDateAndTime,
  parseDateTime,
  parseInstant,
  toEpochMinutes,
} from "./timestamps.js";

// ─── Column synonyms ────────────────────────────────────────────

export type CanonicalField =
  | "airline"
  | "flightNumber"
  | "origin"
  | "destination"
  | "status"
  | "scheduledAt"
  | "scheduledDate"
  | "scheduledTime"
  | "actualAt"
  | "actualDate"
  | "actualTime"
  | "observedAt";

export type ColumnMapping = Partial<Record<CanonicalField, string>>;

type SynonymTable = Record<CanonicalField, readonly string[]>;

/**
 * Claim order. Fields whose synonyms are substrings of other headers
 * ("voo" inside "situacao_voo") come last so the specific field claims first.
 */
const FIELD_ORDER: readonly CanonicalField[] = [
  "status",
  "actualAt",
  "scheduledAt",
  "actualDate",
  "actualTime",
  "scheduledDate",
  "scheduledTime",
  "observedAt",
  "origin",
  "destination",
  "airline",
  "flightNumber",
];

export const FIELD_SYNONYMS: Record<RecordSource, SynonymTable> = {
  HistoricalImport: {
    airline: ["sigla_icao_empresa_aerea", "sigla_icao", "icao_empresa", "empresa_aerea", "empresa", "companhia", "airline"],
    flightNumber: ["numero_voo", "numero_do_voo", "flight_number", "numero", "voo", "flight"],
    origin: ["icao_aerodromo_origem", "aerodromo_origem", "aeroporto_origem", "icao_origem", "origem", "origin"],
    destination: ["icao_aerodromo_destino", "aerodromo_destino", "aeroporto_destino", "icao_destino", "destino", "destination"],
    status: ["situacao_voo", "situacao", "status"],
    scheduledAt: ["partida_prevista", "data_partida_prevista", "scheduled_at", "scheduled_datetime"],
    scheduledDate: ["data_prevista", "data_voo", "scheduled_date", "date"],
    scheduledTime: ["hora_prevista", "horario_previsto", "scheduled_time", "scheduled", "sched"],
    actualAt: ["partida_real", "data_partida_real", "actual_at", "actual_datetime"],
    actualDate: ["data_real", "actual_date"],
    actualTime: ["hora_real", "horario_real", "actual_time", "actual"],
    observedAt: ["data_registro", "observed_at"],
  },
  LiveFeed: {
    airline: ["companhia", "cia_aerea", "airline", "empresa", "carrier"],
    flightNumber: ["numero_voo", "flight_number", "numero", "voo", "flight"],
    origin: ["origem", "origin"],
    destination: ["destino", "destination", "cidade"],
    status: ["status", "situacao"],
    scheduledAt: ["scheduled_at", "partida_prevista"],
    scheduledDate: ["data_partida", "data_voo", "scheduled_date", "data", "date"],
    scheduledTime: ["horario_previsto", "horario", "scheduled_time", "hora", "scheduled", "sched"],
    actualAt: ["actual_at", "partida_real"],
    actualDate: ["data_real", "actual_date"],
    actualTime: ["horario_real", "horario_estimado", "actual_time", "estimado", "actual"],
    observedAt: ["data_captura", "observed_at", "scraped_at", "created_at"],
  },
};

/**
 * Map canonical fields to the row's actual column names. Exact header
 * matches are claimed first, then substring matches; a column is claimed
 * by at most one field.
 */
export function identifyColumns(headers: readonly string[], synonyms: SynonymTable): ColumnMapping {
  const columns = headers.map((raw) => ({ raw, norm: normalizeHeader(raw) }));
  const claimed = new Set<string>();
  const mapping: ColumnMapping = {};

  for (const pass of ["exact", "contains"] as const) {
    for (const field of FIELD_ORDER) {
      if (mapping[field]) continue;
      for (const synonym of synonyms[field]) {
        const hit = columns.find((c) =>
          !claimed.has(c.raw) && (pass === "exact" ? c.norm === synonym : c.norm.includes(synonym)),
        );
        if (hit) {
          mapping[field] = hit.raw;
          claimed.add(hit.raw);
          break;
        }
      }
    }
  }

  return mapping;
}

// ─── Results ────────────────────────────────────────────────────

export type NormalizationErrorCode = typeof ErrorCode.MISSING_FIELD | typeof ErrorCode.INVALID_TIMESTAMP;

export interface NormalizationFailure {
  position: string;
  source: RecordSource;
  code: NormalizationErrorCode;
  reason: string;
}

export type NormalizeResult =
  | { ok: true; record: FlightRecord }
  | ({ ok: false } & NormalizationFailure);

export interface NormalizerOptions {
  /** Origin used when a row has no origin column (single-airport live feeds). */
  defaultOrigin: string;
}

// ─── Field helpers ──────────────────────────────────────────────

function cell(row: RawRow, mapping: ColumnMapping, field: CanonicalField): string {
  const column = mapping[field];
  if (!column) return "";
  const value = row.columns[column];
  if (value === undefined) return "";
  const trimmed = value.trim();
  // Spreadsheet exports write empty cells as these literals
  return trimmed === "nan" || trimmed === "None" || trimmed === "null" ? "" : trimmed;
}

/**
 * "G3 01234" → "1234", "AD4050" → "4050", "1234A" → "1234A", "000" → "0".
 */
export function cleanFlightNumber(tables: LookupTables, raw: string): string {
  const compact = raw.replace(/[^0-9A-Za-z]/g, "").toUpperCase();
  const prefix = matchCarrierPrefix(tables, compact);
  const rest = prefix ? compact.slice(prefix.length) : compact.replace(/^[A-Z]+(?=\d)/, "");
  return rest.replace(/^0+(?=.)/, "");
}

export function classifyStatus(rawStatus: string, delayMinutes: number): FlightStatus {
  const folded = foldLookup(rawStatus);
  if (folded.includes("cancel")) return "Cancelled";
  if (delayMinutes > 0) return "Delayed";
  if (folded.includes("atras") || folded.includes("delay")) return "Delayed";
  return "Scheduled";
}

type TimestampField = { ok: true; value: Timestamp | null } | { ok: false; reason: string };

function readTimestamp(
  row: RawRow,
  mapping: ColumnMapping,
  combined: CanonicalField,
  dateField: CanonicalField,
  timeField: CanonicalField,
  fallbackDate: string | null,
): TimestampField {
  const combinedValue = cell(row, mapping, combined);
  if (combinedValue) {
    const parsed = parseDateTime(combinedValue);
    return parsed ? { ok: true, value: parsed } : { ok: false, reason: `unparseable ${combined} "${combinedValue}"` };
  }

  const time = cell(row, mapping, timeField);
  if (!time) return { ok: true, value: null };

  // A time cell may already carry its date ("15/12/2025 08:30")
  const timeAsDateTime = parseDateTime(time);
  if (timeAsDateTime) return { ok: true, value: timeAsDateTime };

  const date = cell(row, mapping, dateField);
  if (date) {
    const parsed = parseDateAndTime(date, time);
    return parsed ? { ok: true, value: parsed } : { ok: false, reason: `unparseable ${dateField}/${timeField} "${date} ${time}"` };
  }
  if (fallbackDate) {
    const parsed = parseDateAndTime(fallbackDate, time);
    return parsed ? { ok: true, value: parsed } : { ok: false, reason: `unparseable ${timeField} "${time}"` };
  }
  return { ok: false, reason: `${timeField} "${time}" has no date` };
}

function fail(row: RawRow, code: NormalizationErrorCode, reason: string): NormalizeResult {
  return { ok: false, position: row.position, source: row.source, code, reason };
}

// ─── Normalize ──────────────────────────────────────────────────

/** Normalize one raw row against a precomputed column mapping. */
export function normalizeMappedRow(
  row: RawRow,
  mapping: ColumnMapping,
  tables: LookupTables,
  options: NormalizerOptions,
): NormalizeResult {
  const rawNumber = cell(row, mapping, "flightNumber");
  if (!rawNumber) return fail(row, ErrorCode.MISSING_FIELD, "flight number is empty");

  const flightNumber = cleanFlightNumber(tables, rawNumber);
  if (!flightNumber) return fail(row, ErrorCode.MISSING_FIELD, `flight number "${rawNumber}" has no digits`);

  const rawAirline = cell(row, mapping, "airline") || matchCarrierPrefix(tables, rawNumber) || "";
  const airlineName = rawAirline ? resolveAirlineName(tables, rawAirline) : "";
  if (!airlineName) return fail(row, ErrorCode.MISSING_FIELD, "airline is empty and cannot be inferred");

  const scheduled = readTimestamp(row, mapping, "scheduledAt", "scheduledDate", "scheduledTime", null);
  if (!scheduled.ok) return fail(row, ErrorCode.INVALID_TIMESTAMP, scheduled.reason);
  if (!scheduled.value) return fail(row, ErrorCode.MISSING_FIELD, "scheduled time is empty");
  const scheduledAt = scheduled.value;

  const actualDateCell = cell(row, mapping, "actualDate");
  const fallbackDate = actualDateCell ? null : datePart(scheduledAt);
  const actual = readTimestamp(row, mapping, "actualAt", "actualDate", "actualTime", fallbackDate);
  if (!actual.ok) return fail(row, ErrorCode.INVALID_TIMESTAMP, actual.reason);
  let actualAt = actual.value;

  // A bare actual time borrowed the scheduled date; past-midnight departures roll over
  const borrowedDate = fallbackDate !== null && !cell(row, mapping, "actualAt")
    && parseDateTime(cell(row, mapping, "actualTime")) === null;
  if (actualAt && borrowedDate && toEpochMinutes(actualAt) < toEpochMinutes(scheduledAt) - 12 * 60) {
    actualAt = addDays(actualAt, 1);
  }

  const rawStatus = cell(row, mapping, "status");
  const measured = actualAt ? Math.max(0, toEpochMinutes(actualAt) - toEpochMinutes(scheduledAt)) : 0;
  const status = classifyStatus(rawStatus, measured);
  const delayMinutes = status === "Delayed" ? measured : 0;

  const rawOrigin = cell(row, mapping, "origin") || options.defaultOrigin;
  const origin = resolveLocationCode(tables, resolveCity(tables, rawOrigin)) ?? rawOrigin.toUpperCase();

  const rawDestination = cell(row, mapping, "destination");
  const destination = rawDestination ? resolveCity(tables, rawDestination) : "";
  const destinationCode = destination ? resolveLocationCode(tables, destination) : undefined;

  const observedAt = parseInstant(cell(row, mapping, "observedAt")) ?? row.observedAt;

  const record: FlightRecord = {
    airlineName,
    flightNumber,
    origin,
    destination,
    ...(destinationCode ? { destinationCode } : {}),
    status,
    scheduledAt,
    actualAt,
    delayMinutes,
    source: row.source,
    observedAt,
  };
  return { ok: true, record };
}

/** Normalize one raw row. */
export function normalizeRow(row: RawRow, tables: LookupTables, options: NormalizerOptions): NormalizeResult {
  const mapping = identifyColumns(Object.keys(row.columns), FIELD_SYNONYMS[row.source]);
  return normalizeMappedRow(row, mapping, tables, options);
}

export interface NormalizeBatchResult {
  records: FlightRecord[];
  failures: NormalizationFailure[];
}

/**
 * Normalize a batch. Column mappings are cached per source + header set,
 * since rows of one file share their headers.
 */
export function normalizeRows(
  rows: Iterable<RawRow>,
  tables: LookupTables,
  options: NormalizerOptions,
): NormalizeBatchResult {
  const mappings = new Map<string, ColumnMapping>();
  const records: FlightRecord[] = [];
  const failures: NormalizationFailure[] = [];

  for (const row of rows) {
    const headers = Object.keys(row.columns);
    const cacheKey = `${row.source}\u0000${headers.join("\u0000")}`;
    let mapping = mappings.get(cacheKey);
    if (!mapping) {
      mapping = identifyColumns(headers, FIELD_SYNONYMS[row.source]);
      mappings.set(cacheKey, mapping);
    }

    const result = normalizeMappedRow(row, mapping, tables, options);
    if (result.ok) {
      records.push(result.record);
    } else {
      const { ok: _ok, ...failure } = result;
      failures.push(failure);
    }
  }

  return { records, failures };
}
