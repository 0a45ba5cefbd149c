/**
 * tabular-fetcher.ts — Historical exports (CSV / TSV / XLSX) → raw rows.
 *
 * Regulator exports arrive `;`-delimited and latin-1 encoded more often than
 * not; the delimiter is sniffed from the header line and the text is decoded
 * as UTF-8 unless that produces replacement characters.
 */

import { readFile } from "node:fs/promises";
import { basename, extname } from "node:path";
import { read, utils } from "xlsx";
import { ErrorCode, PipelineError, describeError } from "../errors.js";
import { log } from "../logger.js";
import type { RawRow, RecordSource } from "../types/flight-types.js";
import { makeRow, type FetcherOptions, type SourceFetcher } from "./types.js";

export type TabularFormat = "csv" | "tsv" | "xlsx";

const DELIMITERS = [";", "\t", ","] as const;

export function detectFormat(path: string): TabularFormat {
  const ext = extname(path).toLowerCase();
  if (ext === ".xlsx" || ext === ".xls") return "xlsx";
  if (ext === ".tsv") return "tsv";
  return "csv";
}

/** UTF-8 first; latin-1 when UTF-8 decoding hits invalid sequences. */
export function decodeText(buffer: Buffer): string {
  const utf8 = buffer.toString("utf8");
  const text = utf8.includes("\uFFFD") ? buffer.toString("latin1") : utf8;
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

/** The candidate delimiter that splits the header line into the most cells. */
export function sniffDelimiter(text: string): string {
  const header = text.split(/\r?\n/, 1)[0] ?? "";
  let best: string = DELIMITERS[0];
  let bestCount = 0;
  for (const delimiter of DELIMITERS) {
    const count = header.split(delimiter).length - 1;
    if (count > bestCount) {
      best = delimiter;
      bestCount = count;
    }
  }
  return best;
}

/** One non-blank table row and the 1-based line (or sheet row) it starts on. */
export interface TableRow {
  line: number;
  cells: string[];
}

function tidy(line: number, raw: readonly string[]): TableRow | null {
  const cells = raw.map((cell) => cell.trim());
  return cells.some((cell) => cell !== "") ? { line, cells } : null;
}

/**
 * Splits an export on `delimiter`, honouring `"` quoting (`""` escapes a
 * quote). Line ends may be LF, CRLF or a bare CR, with or without one at
 * the end of the file. Cells are trimmed and blank rows dropped.
 */
export function parseDelimited(text: string, delimiter: string): TableRow[] {
  const rows: TableRow[] = [];
  let cells: string[] = [];
  let cell = "";
  let quoted = false;
  let line = 1;
  let rowStart = 1;

  const endCell = () => {
    cells.push(cell);
    cell = "";
  };
  const endRow = () => {
    endCell();
    const row = tidy(rowStart, cells);
    if (row) rows.push(row);
    cells = [];
  };

  for (let i = 0; i < text.length; i += 1) {
    const char = text.charAt(i);
    if (char === "\r" && text.charAt(i + 1) === "\n") continue;
    const lineEnd = char === "\r" || char === "\n";
    if (lineEnd) line += 1;

    if (quoted) {
      if (char !== '"') cell += lineEnd ? "\n" : char;
      else if (text.charAt(i + 1) === '"') {
        cell += '"';
        i += 1;
      } else quoted = false;
    } else if (char === '"') {
      quoted = true;
    } else if (char === delimiter) {
      endCell();
    } else if (lineEnd) {
      endRow();
      rowStart = line;
    } else {
      cell += char;
    }
  }
  if (cell !== "" || cells.length > 0) endRow();

  return rows;
}

/** First worksheet as display text. */
export function parseXlsxFirstSheet(buffer: Buffer): TableRow[] {
  const workbook = read(buffer, { type: "buffer" });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName === undefined ? undefined : workbook.Sheets[sheetName];
  if (!sheet) {
    log.ingest.warn("workbook has no sheets");
    return [];
  }

  // Formatted text keeps the export's day-first dates; blank rows stay so indexes track sheet rows
  const grid = utils.sheet_to_json<unknown[]>(sheet, { header: 1, raw: false, defval: "", blankrows: true });
  const firstRow = utils.decode_range(sheet["!ref"] ?? "A1").s.r;
  const rows: TableRow[] = [];
  grid.forEach((values, index) => {
    const row = tidy(firstRow + index + 1, values.map((value) => (value == null ? "" : String(value))));
    if (row) rows.push(row);
  });
  return rows;
}

export function parseTable(buffer: Buffer, format: TabularFormat): TableRow[] {
  if (format === "xlsx") return parseXlsxFirstSheet(buffer);
  const text = decodeText(buffer);
  return parseDelimited(text, format === "tsv" ? "\t" : sniffDelimiter(text));
}

export class TabularFileFetcher implements SourceFetcher {
  private readonly now: () => Date;

  constructor(
    readonly source: RecordSource = "HistoricalImport",
    options: FetcherOptions = {},
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async *fetchRaw(location: string): AsyncIterable<RawRow> {
    let buffer: Buffer;
    try {
      buffer = await readFile(location);
    } catch (err) {
      throw new PipelineError(ErrorCode.SOURCE_UNREADABLE, `cannot read ${location}: ${describeError(err)}`, { cause: err });
    }

    const [header, ...body] = parseTable(buffer, detectFormat(location));
    if (!header) return;

    const observedAt = this.now().toISOString();
    const name = basename(location);

    for (const { line, cells } of body) {
      const columns: Record<string, string> = {};
      header.cells.forEach((column, col) => {
        columns[column] = cells[col] ?? "";
      });
      yield makeRow(this.source, columns, `${name}:${line}`, observedAt);
    }

    log.ingest.info({ file: name, rows: body.length }, "tabular source read");
  }
}
