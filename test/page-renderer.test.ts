/**
 * page-renderer.test.ts — Template filling, offer links and HTML documents.
 */

import { describe, expect, it } from "vitest";
import {
  HtmlDocumentRenderer,
  buildOfferLink,
  escapeHtml,
  fillTemplate,
  formatDelay,
  formatWallClock,
  joinUrl,
  loadTemplates,
  rootPrefix,
  statusLabel,
  validateLinkTemplate,
  type TemplateSet,
} from "../src/services/page-renderer.js";
import { artifactFor } from "../src/services/slug.js";
import { LINK_TEMPLATE, TEMPLATES_DIR, makeRecord, thrownBy } from "./helpers/flights.js";

const BASE_URL = "https://delays.example.test";

// ─── Template filling ───────────────────────────────────────────

describe("fillTemplate", () => {
  it("escapes double-brace values and inserts triple-brace values raw", () => {
    const out = fillTemplate("<p>{{name}}</p>{{{raw}}}", { name: "<b>", raw: "<i>ok</i>" });
    expect(out).toBe("<p>&lt;b&gt;</p><i>ok</i>");
  });

  it("throws on an unknown placeholder", () => {
    expect(() => fillTemplate("<p>{{missing}}</p>", {})).toThrow('template references unknown placeholder "missing"');
  });

  it("escapes every markup-significant character", () => {
    expect(escapeHtml(`<a href="x">Tom & 'Jerry'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; &#39;Jerry&#39;&lt;/a&gt;",
    );
  });
});

// ─── Offer link ─────────────────────────────────────────────────

describe("buildOfferLink", () => {
  it("fills tokens from the record", () => {
    expect(buildOfferLink(LINK_TEMPLATE, makeRecord())).toBe(
      "https://claims.example.test/check?from=GRU&to=GIG&ref=test-partner",
    );
  });

  it("drops query parameters left empty", () => {
    const record = makeRecord({ destination: "Montevidéu", destinationCode: undefined });
    expect(buildOfferLink(LINK_TEMPLATE, record)).toBe("https://claims.example.test/check?from=GRU&ref=test-partner");
  });

  it("URL-encodes token values", () => {
    expect(buildOfferLink("https://claims.example.test/{destination}?a={airline}", makeRecord())).toBe(
      "https://claims.example.test/Rio%20de%20Janeiro?a=GOL",
    );
  });
});

describe("validateLinkTemplate", () => {
  it("accepts a template built from known tokens", () => {
    expect(() => validateLinkTemplate(LINK_TEMPLATE)).not.toThrow();
  });

  it("rejects unknown tokens", () => {
    expect(thrownBy(() => validateLinkTemplate("https://claims.example.test/?f={from}"))).toMatchObject({
      code: "CONFIG_INVALID",
      message: "link template uses unknown token {from}",
    });
  });

  it("rejects relative templates", () => {
    expect(() => validateLinkTemplate("claims/{origin}")).toThrow("link template is not an absolute URL");
  });
});

// ─── Formatting ─────────────────────────────────────────────────

describe("formatting", () => {
  it("formats wall-clock times day first", () => {
    expect(formatWallClock("2025-12-15T08:30:00")).toBe("15/12/2025 08:30");
  });

  it("formats delays in minutes and hours", () => {
    expect(formatDelay(45)).toBe("45 min");
    expect(formatDelay(60)).toBe("1h 00min");
    expect(formatDelay(125)).toBe("2h 05min");
  });

  it("labels each status", () => {
    expect(statusLabel({ status: "Delayed", delayMinutes: 50 })).toBe("Delayed 50 min");
    expect(statusLabel({ status: "Cancelled", delayMinutes: 0 })).toBe("Cancelled");
    expect(statusLabel({ status: "Scheduled", delayMinutes: 0 })).toBe("On schedule");
  });

  it("climbs back to the root from nested pages", () => {
    expect(rootPrefix("index.html")).toBe("");
    expect(rootPrefix("cities/salvador.html")).toBe("../");
  });

  it("joins base URLs and paths with one slash", () => {
    expect(joinUrl("https://a.example.test/", "flights/x.html")).toBe("https://a.example.test/flights/x.html");
    expect(joinUrl("https://a.example.test", "")).toBe("https://a.example.test/");
  });
});

// ─── HtmlDocumentRenderer ───────────────────────────────────────

describe("HtmlDocumentRenderer", () => {
  it("renders a record page from the bundled templates", async () => {
    const renderer = new HtmlDocumentRenderer(await loadTemplates(TEMPLATES_DIR), { baseUrl: BASE_URL, linkTemplate: LINK_TEMPLATE });
    const record = makeRecord();
    const html = renderer.renderRecord(record, artifactFor(record, "GOL|1234|2025-12-15"));

    expect(html).toContain("<title>GOL 1234 delayed 45 min from GRU</title>");
    expect(html).toContain(`<link rel="canonical" href="${BASE_URL}/flights/gol-1234-gru-delayed-2025-12-15.html">`);
    expect(html).toContain("<dt>Scheduled</dt><dd>15/12/2025 08:30</dd>");
    expect(html).toContain("<dt>Delay</dt><dd>45 min</dd>");
    expect(html).toContain('href="https://claims.example.test/check?from=GRU&amp;to=GIG&amp;ref=test-partner"');
  });

  it("escapes record text", async () => {
    const renderer = new HtmlDocumentRenderer(await loadTemplates(TEMPLATES_DIR), { baseUrl: BASE_URL, linkTemplate: LINK_TEMPLATE });
    const record = makeRecord({ airlineName: "<script>" });
    const html = renderer.renderRecord(record, artifactFor(record, "SCRIPT|1234|2025-12-15"));
    expect(html).toContain("<h1>&lt;script&gt; 1234</h1>");
    expect(html).not.toContain("<script>");
  });

  it("renders listings through the item template", () => {
    const templates: TemplateSet = {
      flight: "",
      index: "<h1>{{title}}</h1>{{count}}<ul>{{{items}}}</ul>",
      listing: "<h2>{{title}}</h2>{{canonical_url}}<ul>{{{items}}}</ul>",
      "listing-item": '<li><a href="{{href}}">{{airline}} {{flight_number}}</a> {{status_label}}</li>',
      cities: "<h2>{{title}}</h2>{{count}}<ul>{{{items}}}</ul>",
      "city-item": '<li><a href="{{href}}">{{name}}</a> {{code}} {{count}}</li>',
      "not-found": '<a href="{{home_url}}">home</a>',
    };
    const renderer = new HtmlDocumentRenderer(templates, { baseUrl: BASE_URL, linkTemplate: LINK_TEMPLATE });
    const record = makeRecord();
    const entries = [{ record, artifact: artifactFor(record, "GOL|1234|2025-12-15") }];

    expect(renderer.renderListing({ kind: "home", path: "index.html", title: "Home", entries })).toBe(
      '<h1>Home</h1>1<ul><li><a href="flights/gol-1234-gru-delayed-2025-12-15.html">GOL 1234</a> Delayed 45 min</li></ul>',
    );
    expect(renderer.renderListing({ kind: "delayed", path: "delayed.html", title: "Delayed flights", entries: [] })).toBe(
      `<h2>Delayed flights</h2>${BASE_URL}/delayed.html<ul></ul>`,
    );
    expect(renderer.renderListing({ kind: "city", path: "cities/rio-de-janeiro.html", title: "Flights to Rio de Janeiro", entries })).toBe(
      `<h2>Flights to Rio de Janeiro</h2>${BASE_URL}/cities/rio-de-janeiro.html` +
        '<ul><li><a href="../flights/gol-1234-gru-delayed-2025-12-15.html">GOL 1234</a> Delayed 45 min</li></ul>',
    );
    expect(
      renderer.renderCityIndex({
        path: "cities.html",
        title: "Destinations",
        cities: [{ name: "São Paulo", code: "GRU", path: "cities/sao-paulo.html", count: 2, lastmod: "2025-12-15" }],
      }),
    ).toBe('<h2>Destinations</h2>1<ul><li><a href="cities/sao-paulo.html">São Paulo</a> GRU 2</li></ul>');
    expect(renderer.renderNotFound()).toBe(`<a href="${BASE_URL}/">home</a>`);
  });

  it("reports a missing template directory as TEMPLATE_MISSING", async () => {
    await expect(loadTemplates(`${TEMPLATES_DIR}/does-not-exist`)).rejects.toMatchObject({ code: "TEMPLATE_MISSING" });
  });
});
