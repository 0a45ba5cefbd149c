/**
 * slug.ts — Deterministic artifact naming.
 */

import type { ArtifactRef, CanonicalKeyString, FlightRecord } from "../types/flight-types.js";
import { datePart } from "./timestamps.js";
import { slugifyPart } from "./text.js";

export const RECORD_DIR = "flights";

export interface SlugParts {
  airlineName: string;
  flightNumber: string;
  origin: string;
  status: string;
  /** `YYYY-MM-DD`; appended for record pages so repeat flights get their own page. */
  date?: string;
}

/** `slug({ GOL, 1234, GRU, Delayed })` → `gol-1234-gru-delayed`. */
export function buildSlug(parts: SlugParts): string {
  return [parts.airlineName, parts.flightNumber, parts.origin, parts.status, parts.date ?? ""]
    .map(slugifyPart)
    .filter((part) => part.length > 0)
    .join("-");
}

export function artifactFor(record: FlightRecord, key: CanonicalKeyString): ArtifactRef {
  const slug = buildSlug({
    airlineName: record.airlineName,
    flightNumber: record.flightNumber,
    origin: record.origin,
    status: record.status,
    date: datePart(record.scheduledAt),
  });
  return { key, slug, path: `${RECORD_DIR}/${slug}.html` };
}
