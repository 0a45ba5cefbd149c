/**
 * canonical-key.ts — Deterministic identity of one flight event.
 *
 * `(airline, number, scheduled date)` folded to upper-case alphanumerics,
 * so "Gol" / "GOL" / "G O L" collapse to one key.
 */

import type { CanonicalKey, CanonicalKeyString, FlightRecord } from "../types/flight-types.js";
import { foldIdentity } from "./text.js";

export type KeyResult =
  | { ok: true; key: CanonicalKey }
  | { ok: false; reason: string };

const DATE_PREFIX = /^(\d{4})-(\d{2})-(\d{2})T/;

export function deriveKey(record: Pick<FlightRecord, "airlineName" | "flightNumber" | "scheduledAt">): KeyResult {
  const airline = foldIdentity(record.airlineName);
  if (!airline) return { ok: false, reason: "airline is empty after normalization" };

  const flightNumber = foldIdentity(record.flightNumber);
  if (!flightNumber) return { ok: false, reason: "flight number is empty after normalization" };

  const match = DATE_PREFIX.exec(record.scheduledAt);
  if (!match) return { ok: false, reason: `scheduled time "${record.scheduledAt}" has no date` };
  const date = `${match[1]}-${match[2]}-${match[3]}`;
  const midnight = new Date(`${date}T00:00:00Z`);
  if (Number.isNaN(midnight.getTime()) || midnight.toISOString().slice(0, 10) !== date) {
    return { ok: false, reason: `scheduled date "${date}" is not a calendar date` };
  }

  return { ok: true, key: { airline, flightNumber, date } };
}

export function keyToString(key: CanonicalKey): CanonicalKeyString {
  return `${key.airline}|${key.flightNumber}|${key.date}`;
}

/** Code-unit order; locale-independent so every host sorts identically. */
export function compareKeys(a: CanonicalKeyString, b: CanonicalKeyString): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
