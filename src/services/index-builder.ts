/**
 * index-builder.ts — Sitemap, homepage, category and destination listings.
 *
 * Pure: derived only from the live artifact set (plus retained orphans when
 * configured), so two runs over the same inputs produce identical indexes.
 */

import type { FlightStatus } from "../types/flight-types.js";
import { compareKeys } from "./canonical-key.js";
import type { RetainedArtifact } from "./orphan-reconciler.js";
import {
  escapeHtml,
  joinUrl,
  type CityIndexPage,
  type CitySummary,
  type ListingEntry,
  type ListingPage,
} from "./page-renderer.js";
import { slugifyPart } from "./text.js";

export const HOME_PATH = "index.html";
export const CATEGORY_PAGES = {
  cancelled: { path: "cancelled.html", title: "Cancelled flights", status: "Cancelled" },
  delayed: { path: "delayed.html", title: "Delayed flights", status: "Delayed" },
} as const satisfies Record<string, { path: string; title: string; status: FlightStatus }>;
export const CITY_INDEX_PATH = "cities.html";
export const CITY_DIR = "cities";
export const NOT_FOUND_PATH = "404.html";

export interface SitemapEntry {
  path: string;
  lastmod: string | null;
}

export interface AggregateIndexes {
  sitemap: SitemapEntry[];
  homepage: ListingPage;
  categories: { cancelled: ListingPage; delayed: ListingPage };
  /** One listing per destination city, ordered by path. */
  cities: ListingPage[];
  cityIndex: CityIndexPage;
}

export interface IndexOptions {
  homepageSize: number;
  homeTitle?: string;
}

/** Most recently observed first; ties by canonical key. */
export function compareListingEntries(a: ListingEntry, b: ListingEntry): number {
  if (a.record.observedAt !== b.record.observedAt) {
    return a.record.observedAt < b.record.observedAt ? 1 : -1;
  }
  return compareKeys(a.artifact.key, b.artifact.key);
}

function latest(dates: Iterable<string>): string | null {
  let max: string | null = null;
  for (const date of dates) if (max === null || date > max) max = date;
  return max;
}

// Unresolved ICAO codes ("SBXX") are not city names
const BARE_AIRPORT_CODE = /^[A-Z]{4}$/;

export function citySlug(destination: string): string | null {
  const name = destination.trim();
  if (!name || BARE_AIRPORT_CODE.test(name)) return null;
  const slug = slugifyPart(name);
  return slug || null;
}

function byPath<T extends { path: string }>(a: T, b: T): number {
  return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
}

/** Group ordered entries by destination; spellings that slug alike share a page. */
function buildCityPages(ordered: readonly ListingEntry[]): { pages: ListingPage[]; summaries: CitySummary[] } {
  const groups = new Map<string, ListingEntry[]>();
  for (const entry of ordered) {
    const slug = citySlug(entry.record.destination);
    if (!slug) continue;
    const group = groups.get(slug);
    if (group) group.push(entry);
    else groups.set(slug, [entry]);
  }

  const pages: ListingPage[] = [];
  const summaries: CitySummary[] = [];
  for (const [slug, entries] of groups) {
    const name = entries.map((e) => e.record.destination.trim()).sort()[0] ?? slug;
    const code = entries.find((e) => e.record.destinationCode)?.record.destinationCode ?? "";
    const path = `${CITY_DIR}/${slug}.html`;
    pages.push({ kind: "city", path, title: `Flights to ${name}`, entries });
    summaries.push({
      name,
      code,
      path,
      count: entries.length,
      lastmod: latest(entries.map((e) => e.record.observedAt.slice(0, 10))) ?? "",
    });
  }
  return { pages: pages.sort(byPath), summaries: summaries.sort(byPath) };
}

export function buildIndexes(
  liveEntries: readonly ListingEntry[],
  retained: readonly RetainedArtifact[],
  options: IndexOptions,
): AggregateIndexes {
  const ordered = [...liveEntries].sort(compareListingEntries);

  const cities = buildCityPages(ordered);

  const artifactEntries: SitemapEntry[] = [
    ...cities.summaries.map((c) => ({ path: c.path, lastmod: c.lastmod })),
    ...liveEntries.map((e) => ({ path: e.artifact.path, lastmod: e.record.observedAt.slice(0, 10) })),
    ...retained.map((r) => ({ path: r.path, lastmod: r.lastmod })),
  ].sort(byPath);

  const aggregateLastmod = latest(liveEntries.map((e) => e.record.observedAt.slice(0, 10)));
  const sitemap: SitemapEntry[] = [
    { path: "", lastmod: aggregateLastmod },
    { path: CATEGORY_PAGES.cancelled.path, lastmod: aggregateLastmod },
    { path: CATEGORY_PAGES.delayed.path, lastmod: aggregateLastmod },
    { path: CITY_INDEX_PATH, lastmod: aggregateLastmod },
    ...artifactEntries,
  ];

  const category = (page: (typeof CATEGORY_PAGES)[keyof typeof CATEGORY_PAGES], kind: "cancelled" | "delayed"): ListingPage => ({
    kind,
    path: page.path,
    title: page.title,
    entries: ordered.filter((e) => e.record.status === page.status),
  });

  return {
    sitemap,
    homepage: {
      kind: "home",
      path: HOME_PATH,
      title: options.homeTitle ?? "Flight delays and cancellations",
      entries: ordered.slice(0, Math.max(0, options.homepageSize)),
    },
    categories: {
      cancelled: category(CATEGORY_PAGES.cancelled, "cancelled"),
      delayed: category(CATEGORY_PAGES.delayed, "delayed"),
    },
    cities: cities.pages,
    cityIndex: { path: CITY_INDEX_PATH, title: "Destinations", cities: cities.summaries },
  };
}

// ─── Serializers ────────────────────────────────────────────────

export function renderSitemapXml(entries: readonly SitemapEntry[], baseUrl: string): string {
  const urls = entries.map((entry) => {
    const lastmod = entry.lastmod ? `<lastmod>${entry.lastmod}</lastmod>` : "";
    return `  <url><loc>${escapeHtml(joinUrl(baseUrl, entry.path))}</loc>${lastmod}</url>`;
  });
  return [
    `<?xml version="1.0" encoding="UTF-8"?>`,
    `<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">`,
    ...urls,
    `</urlset>`,
    "",
  ].join("\n");
}

export function renderRobots(baseUrl: string): string {
  return `User-agent: *\nAllow: /\n\nSitemap: ${joinUrl(baseUrl, "sitemap.xml")}\n`;
}
