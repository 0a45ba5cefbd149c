/**
 * json-feed-fetcher.ts — Live-feed snapshot files → raw rows.
 *
 * Accepts a bare array of flat objects or `{ "flights": [...] }`. Scalar
 * cells are stringified; nested values are dropped.
 */

import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { RawRow, RecordSource } from "../types/flight-types.js";
import { makeRow, type FetcherOptions, type SourceFetcher } from "./types.js";

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extractFeedRows(doc: unknown): unknown[] | null {
  if (Array.isArray(doc)) return doc;
  if (isObject(doc) && Array.isArray(doc.flights)) return doc.flights;
  return null;
}

export function toCells(entry: Record<string, unknown>): Record<string, string> {
  const cells: Record<string, string> = {};
  for (const [name, value] of Object.entries(entry)) {
    if (value === null || value === undefined) cells[name] = "";
    else if (typeof value === "string") cells[name] = value;
    else if (typeof value === "number" || typeof value === "boolean") cells[name] = String(value);
  }
  return cells;
}

export class JsonFeedFetcher implements SourceFetcher {
  private readonly now: () => Date;

  constructor(
    readonly source: RecordSource = "LiveFeed",
    options: FetcherOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async *fetchRaw(location: string): AsyncIterable<RawRow> {
    let doc: unknown;
    try {
      doc = JSON.parse(await readFile(location, "utf-8"));
    } catch (err) {
      throw new PipelineError(ErrorCode.SOURCE_UNREADABLE, `cannot read feed ${location}: ${describeError(err)}`, { cause: err });
    }

    const entries = extractFeedRows(doc);
    if (!entries) {
      throw new PipelineError(ErrorCode.SOURCE_UNREADABLE, `feed ${location} is neither an array nor { flights: [...] }`);
    }

    const observedAt = this.now().toISOString();
    const name = basename(location);
    let emitted = 0;

    for (const [i, entry] of entries.entries()) {
      emitted += 1;
      // Non-object entries become empty rows so normalization counts them
      yield makeRow(this.source, isObject(entry) ? toCells(entry) : {}, `${name}[${i}]`, observedAt);
    }

    log.ingest.info({ file: name, rows: emitted }, "json feed read");
  }
}
