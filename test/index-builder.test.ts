/**
 * index-builder.test.ts — Sitemap, homepage, category and destination listings.
 */

import { describe, expect, it } from "vitest";
import { buildIndexes, citySlug, renderRobots, renderSitemapXml } from "../src/services/index-builder.js";
import type { ListingEntry } from "../src/services/page-renderer.js";
import { artifactFor } from "../src/services/slug.js";
import type { FlightRecord } from "../src/types/flight-types.js";
import { makeRecord } from "./helpers/flights.js";

function entry(record: FlightRecord): ListingEntry {
  const key = `${record.airlineName}|${record.flightNumber}|${record.scheduledAt.slice(0, 10)}`;
  return { record, artifact: artifactFor(record, key) };
}

const DELAYED_GOL = entry(makeRecord({ flightNumber: "1", observedAt: "2025-12-15T10:00:00.000Z" }));
const CANCELLED_GOL = entry(
  makeRecord({ flightNumber: "2", status: "Cancelled", delayMinutes: 0, actualAt: null, observedAt: "2025-12-16T08:00:00.000Z" }),
);
const DELAYED_AZUL = entry(makeRecord({ airlineName: "AZUL", flightNumber: "3", observedAt: "2025-12-15T10:00:00.000Z" }));
const LIVE = [DELAYED_GOL, CANCELLED_GOL, DELAYED_AZUL];

describe("buildIndexes", () => {
  it("orders listings by most recent observation, ties by key", () => {
    const indexes = buildIndexes(LIVE, [], { homepageSize: 10 });
    expect(indexes.homepage.entries).toEqual([CANCELLED_GOL, DELAYED_AZUL, DELAYED_GOL]);
    expect(indexes.homepage).toMatchObject({ kind: "home", path: "index.html", title: "Flight delays and cancellations" });
  });

  it("bounds the homepage", () => {
    const indexes = buildIndexes(LIVE, [], { homepageSize: 2, homeTitle: "Disruptions" });
    expect(indexes.homepage.entries).toEqual([CANCELLED_GOL, DELAYED_AZUL]);
    expect(indexes.homepage.title).toBe("Disruptions");
  });

  it("splits category pages by status", () => {
    const { categories } = buildIndexes(LIVE, [], { homepageSize: 10 });
    expect(categories.cancelled).toEqual({ kind: "cancelled", path: "cancelled.html", title: "Cancelled flights", entries: [CANCELLED_GOL] });
    expect(categories.delayed.entries).toEqual([DELAYED_AZUL, DELAYED_GOL]);
  });

  it("lists aggregates first, then artifacts and retained orphans by path", () => {
    const { sitemap } = buildIndexes(LIVE, [{ path: "flights/old-2025-11-01.html", lastmod: "2025-11-30" }], { homepageSize: 10 });
    expect(sitemap).toEqual([
      { path: "", lastmod: "2025-12-16" },
      { path: "cancelled.html", lastmod: "2025-12-16" },
      { path: "delayed.html", lastmod: "2025-12-16" },
      { path: "cities.html", lastmod: "2025-12-16" },
      { path: "cities/rio-de-janeiro.html", lastmod: "2025-12-16" },
      { path: "flights/azul-3-gru-delayed-2025-12-15.html", lastmod: "2025-12-15" },
      { path: "flights/gol-1-gru-delayed-2025-12-15.html", lastmod: "2025-12-15" },
      { path: "flights/gol-2-gru-cancelled-2025-12-15.html", lastmod: "2025-12-16" },
      { path: "flights/old-2025-11-01.html", lastmod: "2025-11-30" },
    ]);
  });

  it("does not depend on input order", () => {
    expect(buildIndexes([...LIVE].reverse(), [], { homepageSize: 2 })).toEqual(buildIndexes(LIVE, [], { homepageSize: 2 }));
  });

  it("produces empty listings and undated aggregates for an empty site", () => {
    const indexes = buildIndexes([], [], { homepageSize: 10 });
    expect(indexes.sitemap).toEqual([
      { path: "", lastmod: null },
      { path: "cancelled.html", lastmod: null },
      { path: "delayed.html", lastmod: null },
      { path: "cities.html", lastmod: null },
    ]);
    expect(indexes.homepage.entries).toEqual([]);
    expect(indexes.cities).toEqual([]);
    expect(indexes.cityIndex).toEqual({ path: "cities.html", title: "Destinations", cities: [] });
  });
});

describe("destination pages", () => {
  const TO_SALVADOR = entry(
    makeRecord({ flightNumber: "4", destination: "Salvador", destinationCode: "SSA", observedAt: "2025-12-14T09:00:00.000Z" }),
  );
  const TO_SAO_PAULO = entry(
    makeRecord({ flightNumber: "5", destination: "Sao Paulo", destinationCode: undefined, observedAt: "2025-12-14T09:00:00.000Z" }),
  );
  const TO_SAO_PAULO_ACCENTED = entry(
    makeRecord({ flightNumber: "6", destination: "São Paulo", destinationCode: "GRU", observedAt: "2025-12-13T09:00:00.000Z" }),
  );
  const TO_UNKNOWN = entry(makeRecord({ flightNumber: "7", destination: "", destinationCode: undefined }));
  const TO_ICAO = entry(makeRecord({ flightNumber: "8", destination: "SBXX", destinationCode: undefined }));

  it("groups live entries by destination, ordered like the other listings", () => {
    const { cities } = buildIndexes([...LIVE, TO_SALVADOR], [], { homepageSize: 10 });
    expect(cities).toEqual([
      { kind: "city", path: "cities/rio-de-janeiro.html", title: "Flights to Rio de Janeiro", entries: [CANCELLED_GOL, DELAYED_AZUL, DELAYED_GOL] },
      { kind: "city", path: "cities/salvador.html", title: "Flights to Salvador", entries: [TO_SALVADOR] },
    ]);
  });

  it("merges spellings that slug alike and takes the first code found", () => {
    const { cities, cityIndex } = buildIndexes([TO_SAO_PAULO, TO_SAO_PAULO_ACCENTED], [], { homepageSize: 10 });
    expect(cities.map((c) => c.path)).toEqual(["cities/sao-paulo.html"]);
    expect(cityIndex.cities).toEqual([
      { name: "Sao Paulo", code: "GRU", path: "cities/sao-paulo.html", count: 2, lastmod: "2025-12-14" },
    ]);
  });

  it("skips empty destinations and bare airport codes", () => {
    expect(citySlug("")).toBeNull();
    expect(citySlug("SBXX")).toBeNull();
    expect(citySlug("Belo Horizonte")).toBe("belo-horizonte");
    expect(buildIndexes([TO_UNKNOWN, TO_ICAO], [], { homepageSize: 10 }).cities).toEqual([]);
  });

  it("lists destinations alphabetically by slug in the index", () => {
    const { cityIndex } = buildIndexes([TO_SALVADOR, ...LIVE], [], { homepageSize: 10 });
    expect(cityIndex.cities.map((c) => `${c.name} ${c.code} ${c.count} ${c.lastmod}`)).toEqual([
      "Rio de Janeiro GIG 3 2025-12-16",
      "Salvador SSA 1 2025-12-14",
    ]);
  });
});

describe("serializers", () => {
  it("renders sitemap XML with absolute locations", () => {
    const xml = renderSitemapXml(
      [
        { path: "", lastmod: null },
        { path: "flights/a.html", lastmod: "2025-12-15" },
      ],
      "https://delays.example.test/",
    );
    expect(xml).toBe(
      [
        '<?xml version="1.0" encoding="UTF-8"?>',
        '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
        "  <url><loc>https://delays.example.test/</loc></url>",
        "  <url><loc>https://delays.example.test/flights/a.html</loc><lastmod>2025-12-15</lastmod></url>",
        "</urlset>",
        "",
      ].join("\n"),
    );
  });

  it("points robots.txt at the sitemap", () => {
    expect(renderRobots("https://delays.example.test")).toBe(
      "User-agent: *\nAllow: /\n\nSitemap: https://delays.example.test/sitemap.xml\n",
    );
  });
});
