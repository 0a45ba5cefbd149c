/**
 * fetchers.test.ts — Tabular exports and JSON feed snapshots → raw rows.
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { utils, write } from "xlsx";
import { JsonFeedFetcher, extractFeedRows, toCells } from "../src/fetchers/json-feed-fetcher.js";
import {
  TabularFileFetcher,
  decodeText,
  detectFormat,
  parseDelimited,
  sniffDelimiter,
} from "../src/fetchers/tabular-fetcher.js";
import type { RawRow } from "../src/types/flight-types.js";

const FETCHED_AT = new Date("2025-12-16T03:00:00Z");
const now = () => FETCHED_AT;

async function collect(rows: AsyncIterable<RawRow>): Promise<RawRow[]> {
  const out: RawRow[] = [];
  for await (const row of rows) out.push(row);
  return out;
}

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "delayboard-fetch-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

// ─── Tabular ────────────────────────────────────────────────────

describe("tabular parsing", () => {
  it("detects the format from the extension", () => {
    expect(detectFormat("a/siros.XLSX")).toBe("xlsx");
    expect(detectFormat("siros.tsv")).toBe("tsv");
    expect(detectFormat("siros.csv")).toBe("csv");
    expect(detectFormat("siros")).toBe("csv");
  });

  it("sniffs the delimiter from the header line", () => {
    expect(sniffDelimiter("a;b;c\n1,2,3")).toBe(";");
    expect(sniffDelimiter("a,b,c\n1;2")).toBe(",");
    expect(sniffDelimiter("a\tb")).toBe("\t");
  });

  it("honours quotes and escaped quotes", () => {
    expect(parseDelimited('a;"b;c";"say ""hi"""\r\n1;2;3', ";")).toEqual([
      { line: 1, cells: ["a", "b;c", 'say "hi"'] },
      { line: 2, cells: ["1", "2", "3"] },
    ]);
  });

  it("reads CRLF exports with a stray carriage return and no final newline", () => {
    expect(parseDelimited("Empresa;Voo\r\n G3 ; 1234\r\n;\r\nAD;4050\r", ";")).toEqual([
      { line: 1, cells: ["Empresa", "Voo"] },
      { line: 2, cells: ["G3", "1234"] },
      { line: 4, cells: ["AD", "4050"] },
    ]);
  });

  it("keeps line numbers across quoted multi-line cells", () => {
    expect(parseDelimited('Voo;Obs\n1234;"linha um\r\nlinha dois"\n4050;ok\n', ";")).toEqual([
      { line: 1, cells: ["Voo", "Obs"] },
      { line: 2, cells: ["1234", "linha um\nlinha dois"] },
      { line: 4, cells: ["4050", "ok"] },
    ]);
  });

  it("falls back to latin-1 and strips a byte-order mark", () => {
    expect(decodeText(Buffer.from("Aérea", "latin1"))).toBe("Aérea");
    expect(decodeText(Buffer.from("\uFEFFAérea", "utf8"))).toBe("Aérea");
  });
});

describe("TabularFileFetcher", () => {
  it("reads a latin-1, semicolon-delimited export and skips blank rows", async () => {
    const file = join(dir, "siros.csv");
    await writeFile(file, Buffer.from("Empresa Aérea;Número Voo;Situação Voo\nG3;1234;REALIZADO\n;;\nAD;4050;CANCELADO\n", "latin1"));

    const rows = await collect(new TabularFileFetcher("HistoricalImport", { now }).fetchRaw(file));

    expect(rows).toEqual([
      {
        source: "HistoricalImport",
        columns: { "Empresa Aérea": "G3", "Número Voo": "1234", "Situação Voo": "REALIZADO" },
        position: "siros.csv:2",
        observedAt: "2025-12-16T03:00:00.000Z",
      },
      {
        source: "HistoricalImport",
        columns: { "Empresa Aérea": "AD", "Número Voo": "4050", "Situação Voo": "CANCELADO" },
        position: "siros.csv:4",
        observedAt: "2025-12-16T03:00:00.000Z",
      },
    ]);
  });

  it("reads the first sheet of a workbook", async () => {
    const workbook = utils.book_new();
    utils.book_append_sheet(workbook, utils.aoa_to_sheet([["Empresa Aérea", "Número Voo"], ["G3", "1234"]]), "Voos");
    const buffer: Buffer = write(workbook, { type: "buffer", bookType: "xlsx" });
    const file = join(dir, "siros.xlsx");
    await writeFile(file, buffer);

    const rows = await collect(new TabularFileFetcher("HistoricalImport", { now }).fetchRaw(file));

    expect(rows.map((r) => r.columns)).toEqual([{ "Empresa Aérea": "G3", "Número Voo": "1234" }]);
    expect(rows[0]?.position).toBe("siros.xlsx:2");
  });

  it("yields nothing for an empty file", async () => {
    const file = join(dir, "empty.csv");
    await writeFile(file, "");
    expect(await collect(new TabularFileFetcher().fetchRaw(file))).toEqual([]);
  });

  it("raises SOURCE_UNREADABLE for a missing file", async () => {
    await expect(collect(new TabularFileFetcher().fetchRaw(join(dir, "missing.csv")))).rejects.toMatchObject({
      code: "SOURCE_UNREADABLE",
    });
  });
});

// ─── JSON feed ──────────────────────────────────────────────────

describe("json feed parsing", () => {
  it("accepts a bare array or a flights wrapper", () => {
    expect(extractFeedRows([1])).toEqual([1]);
    expect(extractFeedRows({ flights: [2] })).toEqual([2]);
    expect(extractFeedRows({ data: [] })).toBeNull();
  });

  it("stringifies scalars and drops nested values", () => {
    expect(toCells({ a: "x", b: 12, c: true, d: null, e: { f: 1 }, g: [1] })).toEqual({ a: "x", b: "12", c: "true", d: "" });
  });
});

describe("JsonFeedFetcher", () => {
  it("emits one row per entry with index positions", async () => {
    const file = join(dir, "live.json");
    await writeFile(file, JSON.stringify({ flights: [{ Numero_Voo: "G3 1234", Horario: "08:30" }, "garbage"] }));

    const rows = await collect(new JsonFeedFetcher("LiveFeed", { now }).fetchRaw(file));

    expect(rows).toEqual([
      { source: "LiveFeed", columns: { Numero_Voo: "G3 1234", Horario: "08:30" }, position: "live.json[0]", observedAt: "2025-12-16T03:00:00.000Z" },
      { source: "LiveFeed", columns: {}, position: "live.json[1]", observedAt: "2025-12-16T03:00:00.000Z" },
    ]);
  });

  it("raises SOURCE_UNREADABLE for invalid JSON", async () => {
    const file = join(dir, "live.json");
    await writeFile(file, "[{");
    await expect(collect(new JsonFeedFetcher().fetchRaw(file))).rejects.toMatchObject({ code: "SOURCE_UNREADABLE" });
  });

  it("raises SOURCE_UNREADABLE for an unexpected document shape", async () => {
    const file = join(dir, "live.json");
    await writeFile(file, '{"data": []}');
    await expect(collect(new JsonFeedFetcher().fetchRaw(file))).rejects.toMatchObject({
      code: "SOURCE_UNREADABLE",
      message: `feed ${file} is neither an array nor { flights: [...] }`,
    });
  });
});
