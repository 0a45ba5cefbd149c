/**
 * timestamps.ts — Ordered-format parsing of the feeds' local wall-clock values.
 *
 * Each list is tried top to bottom; the first pattern that matches and
 * describes a real calendar instant wins. Output is always the canonical
 * `YYYY-MM-DDTHH:mm:ss` form: a zone suffix on a wall-clock value is dropped.
 */

import type { Timestamp } from "../types/flight-types.js";

interface Parts {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
}

interface FormatSpec {
  name: string;
  pattern: RegExp;
  /** Capture group → part, in capture order. */
  groups: ReadonlyArray<keyof Parts>;
}

const YMD_HMS: ReadonlyArray<keyof Parts> = ["year", "month", "day", "hour", "minute", "second"];
const DMY_HMS: ReadonlyArray<keyof Parts> = ["day", "month", "year", "hour", "minute", "second"];

/** `Z` or `±HH:mm` at the end of an ISO timestamp. */
const ZONE_SUFFIX = /(?:Z|[+-]\d{2}:\d{2})$/i;

export const DATETIME_FORMATS: readonly FormatSpec[] = [
  { name: "YYYY-MM-DD HH:mm:ss", pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?$/i, groups: YMD_HMS },
  { name: "DD/MM/YYYY HH:mm:ss", pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/, groups: DMY_HMS },
  { name: "DD-MM-YYYY HH:mm:ss", pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})[ T](\d{1,2}):(\d{2})(?::(\d{2}))?$/, groups: DMY_HMS },
];

export const DATE_FORMATS: readonly FormatSpec[] = [
  { name: "DD/MM/YYYY", pattern: /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/, groups: ["day", "month", "year"] },
  { name: "YYYY-MM-DD", pattern: /^(\d{4})-(\d{1,2})-(\d{1,2})$/, groups: ["year", "month", "day"] },
  { name: "DD-MM-YYYY", pattern: /^(\d{1,2})-(\d{1,2})-(\d{4})$/, groups: ["day", "month", "year"] },
];

export const TIME_FORMATS: readonly FormatSpec[] = [
  { name: "HH:mm:ss", pattern: /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/, groups: ["hour", "minute", "second"] },
  { name: "HHhmm", pattern: /^(\d{1,2})h(\d{2})$/i, groups: ["hour", "minute"] },
];

function emptyParts(): Parts {
  return { year: 0, month: 0, day: 0, hour: 0, minute: 0, second: 0 };
}

function matchFirst(value: string, formats: readonly FormatSpec[]): Parts | null {
  const input = value.trim();
  if (!input) return null;
  for (const format of formats) {
    const match = format.pattern.exec(input);
    if (!match) continue;
    const parts = emptyParts();
    format.groups.forEach((part, index) => {
      const raw = match[index + 1];
      parts[part] = raw === undefined ? 0 : Number.parseInt(raw, 10);
    });
    return parts;
  }
  return null;
}

function isValidDate(p: Pick<Parts, "year" | "month" | "day">): boolean {
  if (p.month < 1 || p.month > 12 || p.day < 1) return false;
  const day = new Date(Date.UTC(p.year, p.month - 1, p.day));
  return day.getUTCFullYear() === p.year && day.getUTCMonth() === p.month - 1 && day.getUTCDate() === p.day;
}

function isValidTime(p: Pick<Parts, "hour" | "minute" | "second">): boolean {
  return p.hour < 24 && p.minute < 60 && p.second < 60;
}

const pad = (n: number, width = 2) => String(n).padStart(width, "0");

function format(p: Parts): Timestamp {
  return `${pad(p.year, 4)}-${pad(p.month)}-${pad(p.day)}T${pad(p.hour)}:${pad(p.minute)}:${pad(p.second)}`;
}

/** Combined date-time cell ("2025-12-15 08:30", "15/12/2025 08:30:00"). */
export function parseDateTime(value: string): Timestamp | null {
  const parts = matchFirst(value, DATETIME_FORMATS);
  if (!parts || !isValidDate(parts) || !isValidTime(parts)) return null;
  return format(parts);
}

/** Split date and time cells ("15/12/2025" + "08:30"). */
export function parseDateAndTime(date: string, time: string): Timestamp | null {
  const d = matchFirst(date, DATE_FORMATS);
  const t = matchFirst(time, TIME_FORMATS);
  if (!d || !t || !isValidDate(d) || !isValidTime(t)) return null;
  return format({ ...d, hour: t.hour, minute: t.minute, second: t.second });
}

/** Minutes since epoch, treating the wall-clock value as UTC. */
export function toEpochMinutes(ts: Timestamp): number {
  const d = ts.slice(0, 10).split("-").map(Number);
  const t = ts.slice(11, 19).split(":").map(Number);
  const ms = Date.UTC(d[0] ?? 0, (d[1] ?? 1) - 1, d[2] ?? 1, t[0] ?? 0, t[1] ?? 0, t[2] ?? 0);
  return Math.floor(ms / 60_000);
}

export function addDays(ts: Timestamp, days: number): Timestamp {
  const ms = toEpochMinutes(ts) * 60_000 + days * 86_400_000;
  return new Date(ms).toISOString().slice(0, 19);
}

/** `YYYY-MM-DD` part of a timestamp. */
export function datePart(ts: Timestamp): string {
  return ts.slice(0, 10);
}

/**
 * Observation instants arrive either as ISO instants or as naive local
 * values; both are returned as ISO instants (naive values read as UTC).
 * Unlike `parseDateTime`, a zone suffix here is honoured.
 */
export function parseInstant(value: string): string | null {
  const input = value.trim();
  if (!input) return null;
  if (/^\d{4}-\d{2}-\d{2}T/.test(input) && ZONE_SUFFIX.test(input)) {
    const ms = Date.parse(input);
    return Number.isNaN(ms) ? null : new Date(ms).toISOString();
  }
  const naive = parseDateTime(input);
  return naive ? `${naive}.000Z` : null;
}
