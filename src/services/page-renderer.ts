/**
 * page-renderer.ts — HTML document rendering from file templates.
 *
 * Templates use `{{name}}` (HTML-escaped) and `{{{name}}}` (raw) placeholders.
 * Rendering never reads the clock: the only time shown on a page is the
 * record's own `observedAt`, so output is a pure function of its input.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { ArtifactRef, FlightRecord, Timestamp } from "../types/flight-types.js";

// ─── Templates ──────────────────────────────────────────────────

export const TEMPLATE_NAMES = ["flight", "index", "listing", "listing-item", "cities", "city-item", "not-found"] as const;
export type TemplateName = (typeof TEMPLATE_NAMES)[number];
export type TemplateSet = Readonly<Record<TemplateName, string>>;

/** Load every template; a missing one aborts the run before anything is written. */
export async function loadTemplates(templatesDir: string): Promise<TemplateSet> {
  const entries = await Promise.all(
    TEMPLATE_NAMES.map(async (name) => {
      const path = join(templatesDir, `${name}.html`);
      try {
        return [name, await readFile(path, "utf-8")] as const;
      } catch (err) {
        throw new PipelineError(ErrorCode.TEMPLATE_MISSING, `template ${path} is not readable: ${describeError(err)}`, { cause: err });
      }
    }),
  );
  const set: Record<TemplateName, string> = {
    flight: "",
    index: "",
    listing: "",
    "listing-item": "",
    cities: "",
    "city-item": "",
    "not-found": "",
  };
  for (const [name, text] of entries) set[name] = text;
  log.render.debug({ templatesDir, count: entries.length }, "templates loaded");
  return set;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

const PLACEHOLDER = /\{\{\{\s*([a-z_]+)\s*\}\}\}|\{\{\s*([a-z_]+)\s*\}\}/g;

/** Substitute placeholders. An unknown placeholder is an error, never blank output. */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(PLACEHOLDER, (_match, raw: string | undefined, escaped: string | undefined) => {
    const name = raw ?? escaped ?? "";
    const value = values[name];
    if (value === undefined) throw new Error(`template references unknown placeholder "${name}"`);
    return raw ? value : escapeHtml(value);
  });
}

// ─── Monetization link ──────────────────────────────────────────

export const LINK_TOKENS = ["origin", "destination", "destination_code", "airline", "flight_number", "date", "status"] as const;
type LinkToken = (typeof LINK_TOKENS)[number];

const LINK_TOKEN = /\{([a-z_]+)\}/g;

function isLinkToken(value: string): value is LinkToken {
  return (LINK_TOKENS as readonly string[]).includes(value);
}

function linkValues(record: FlightRecord): Record<LinkToken, string> {
  return {
    origin: record.origin,
    destination: record.destination,
    destination_code: record.destinationCode ?? "",
    airline: record.airlineName,
    flight_number: record.flightNumber,
    date: record.scheduledAt.slice(0, 10),
    status: record.status,
  };
}

/**
 * Per-record monetization URL. Tokens are URL-encoded; query parameters
 * left empty (a destination with no location code) are dropped.
 */
export function buildOfferLink(template: string, record: FlightRecord): string {
  const values = linkValues(record);
  const filled = template.trim().replace(LINK_TOKEN, (match, name: string) =>
    isLinkToken(name) ? encodeURIComponent(values[name]) : match,
  );
  const url = new URL(filled);
  for (const [param, value] of [...url.searchParams.entries()]) {
    if (value === "") url.searchParams.delete(param);
  }
  return url.toString();
}

/** Reject a link template that could not produce a URL for any record. */
export function validateLinkTemplate(template: string): void {
  for (const match of template.matchAll(LINK_TOKEN)) {
    const name = match[1] ?? "";
    if (!isLinkToken(name)) {
      throw new PipelineError(ErrorCode.CONFIG_INVALID, `link template uses unknown token {${name}}`);
    }
  }
  const sample = template.replace(LINK_TOKEN, "x");
  if (!URL.canParse(sample)) {
    throw new PipelineError(ErrorCode.CONFIG_INVALID, "link template is not an absolute URL");
  }
}

// ─── Formatting ─────────────────────────────────────────────────

/** `2025-12-15T08:30:00` → `15/12/2025 08:30`. */
export function formatWallClock(ts: Timestamp): string {
  return `${ts.slice(8, 10)}/${ts.slice(5, 7)}/${ts.slice(0, 4)} ${ts.slice(11, 16)}`;
}

/** 50 → "50 min", 125 → "2h 05min". */
export function formatDelay(minutes: number): string {
  if (minutes < 60) return `${minutes} min`;
  const rest = minutes % 60;
  return `${Math.floor(minutes / 60)}h ${String(rest).padStart(2, "0")}min`;
}

export function statusLabel(record: Pick<FlightRecord, "status" | "delayMinutes">): string {
  if (record.status === "Cancelled") return "Cancelled";
  if (record.status === "Delayed") return `Delayed ${formatDelay(record.delayMinutes)}`;
  return "On schedule";
}

export function joinUrl(baseUrl: string, path: string): string {
  const base = baseUrl.replace(/\/+$/, "");
  return path ? `${base}/${path}` : `${base}/`;
}

// ─── Renderer ───────────────────────────────────────────────────

export interface ListingEntry {
  readonly record: FlightRecord;
  readonly artifact: ArtifactRef;
}

export type ListingKind = "home" | "cancelled" | "delayed" | "city";

export interface ListingPage {
  readonly kind: ListingKind;
  readonly path: string;
  readonly title: string;
  readonly entries: readonly ListingEntry[];
}

export interface CitySummary {
  readonly name: string;
  /** Location code; empty when the city has none in the tables. */
  readonly code: string;
  readonly path: string;
  readonly count: number;
  readonly lastmod: string;
}

export interface CityIndexPage {
  readonly path: string;
  readonly title: string;
  readonly cities: readonly CitySummary[];
}

/** Produces documents or throws; callers own isolation. */
export interface DocumentRenderer {
  renderRecord(record: FlightRecord, artifact: ArtifactRef): string;
  renderListing(page: ListingPage): string;
  renderCityIndex(page: CityIndexPage): string;
  renderNotFound(): string;
}

/** Relative prefix from a page back to the site root: "cities/x.html" → "../". */
export function rootPrefix(path: string): string {
  return "../".repeat(path.split("/").length - 1);
}

export interface HtmlRendererOptions {
  baseUrl: string;
  linkTemplate: string;
}

export class HtmlDocumentRenderer implements DocumentRenderer {
  constructor(
    private readonly templates: TemplateSet,
    private readonly options: HtmlRendererOptions,
  ) {}

  renderRecord(record: FlightRecord, artifact: ArtifactRef): string {
    const label = statusLabel(record);
    return fillTemplate(this.templates.flight, {
      title: `${record.airlineName} ${record.flightNumber} ${label.toLowerCase()} from ${record.origin}`,
      airline: record.airlineName,
      flight_number: record.flightNumber,
      origin: record.origin,
      destination: record.destination || "Unknown",
      destination_code: record.destinationCode ?? "",
      status: record.status,
      status_label: label,
      status_class: record.status.toLowerCase(),
      scheduled: formatWallClock(record.scheduledAt),
      actual: record.actualAt ? formatWallClock(record.actualAt) : "-",
      delay: formatDelay(record.delayMinutes),
      observed_at: record.observedAt,
      observed_date: record.observedAt.slice(0, 10),
      canonical_url: joinUrl(this.options.baseUrl, artifact.path),
      home_url: joinUrl(this.options.baseUrl, ""),
      offer_url: buildOfferLink(this.options.linkTemplate, record),
    });
  }

  renderListing(page: ListingPage): string {
    const root = rootPrefix(page.path);
    const items = page.entries.map(({ record, artifact }) =>
      fillTemplate(this.templates["listing-item"], {
        href: `${root}${artifact.path}`,
        airline: record.airlineName,
        flight_number: record.flightNumber,
        origin: record.origin,
        destination: record.destination || "Unknown",
        status_label: statusLabel(record),
        status_class: record.status.toLowerCase(),
        scheduled: formatWallClock(record.scheduledAt),
      }),
    );
    const template = page.kind === "home" ? this.templates.index : this.templates.listing;
    return fillTemplate(template, {
      title: page.title,
      canonical_url: joinUrl(this.options.baseUrl, page.kind === "home" ? "" : page.path),
      root,
      count: String(page.entries.length),
      items: items.join("\n"),
    });
  }

  renderCityIndex(page: CityIndexPage): string {
    const items = page.cities.map((city) =>
      fillTemplate(this.templates["city-item"], {
        href: `${rootPrefix(page.path)}${city.path}`,
        name: city.name,
        code: city.code,
        count: String(city.count),
      }),
    );
    return fillTemplate(this.templates.cities, {
      title: page.title,
      canonical_url: joinUrl(this.options.baseUrl, page.path),
      count: String(page.cities.length),
      items: items.join("\n"),
    });
  }

  renderNotFound(): string {
    return fillTemplate(this.templates["not-found"], { home_url: joinUrl(this.options.baseUrl, "") });
  }
}
