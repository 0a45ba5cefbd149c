/**
 * timestamps.test.ts — Ordered-format parsing and wall-clock arithmetic.
 */

import { describe, expect, it } from "vitest";
import {
  addDays,
  parseDateAndTime,
  parseDateTime,
  parseInstant,
  toEpochMinutes,
} from "../src/services/timestamps.js";
import { foldIdentity, foldLookup, normalizeHeader, slugifyPart } from "../src/services/text.js";

describe("parseDateTime", () => {
  it("accepts ISO-like values with or without seconds", () => {
    expect(parseDateTime("2025-12-15 08:30:00")).toBe("2025-12-15T08:30:00");
    expect(parseDateTime("2025-12-15 08:30")).toBe("2025-12-15T08:30:00");
    expect(parseDateTime("2025-12-15T08:30:45")).toBe("2025-12-15T08:30:45");
  });

  it("drops a zone suffix and keeps the wall clock", () => {
    expect(parseDateTime("2025-12-15T08:30:00Z")).toBe("2025-12-15T08:30:00");
    expect(parseDateTime("2025-12-15T08:30:00-03:00")).toBe("2025-12-15T08:30:00");
    expect(parseDateTime("2025-12-15 08:30:00.250+01:00")).toBe("2025-12-15T08:30:00");
  });

  it("accepts day-first values", () => {
    expect(parseDateTime("15/12/2025 08:30")).toBe("2025-12-15T08:30:00");
    expect(parseDateTime("15-12-2025 23:05:09")).toBe("2025-12-15T23:05:09");
    expect(parseDateTime("5/1/2026 7:00")).toBe("2026-01-05T07:00:00");
  });

  it("rejects calendar-invalid values", () => {
    expect(parseDateTime("31/02/2025 08:30")).toBeNull();
    expect(parseDateTime("2025-13-01 08:30")).toBeNull();
    expect(parseDateTime("2025-12-15 24:00")).toBeNull();
  });

  it("rejects empty and unrelated text", () => {
    expect(parseDateTime("")).toBeNull();
    expect(parseDateTime("08:30")).toBeNull();
    expect(parseDateTime("amanhã")).toBeNull();
  });
});

describe("parseDateAndTime", () => {
  it("combines split cells", () => {
    expect(parseDateAndTime("15/12/2025", "08:30")).toBe("2025-12-15T08:30:00");
    expect(parseDateAndTime("2025-12-15", "21h40")).toBe("2025-12-15T21:40:00");
  });

  it("fails when either half is invalid", () => {
    expect(parseDateAndTime("29/02/2025", "08:30")).toBeNull();
    expect(parseDateAndTime("15/12/2025", "8.30")).toBeNull();
  });
});

describe("wall-clock arithmetic", () => {
  it("measures minutes between timestamps", () => {
    expect(toEpochMinutes("2025-12-15T09:20:00") - toEpochMinutes("2025-12-15T08:30:00")).toBe(50);
  });

  it("adds whole days across month ends", () => {
    expect(addDays("2025-12-31T00:10:00", 1)).toBe("2026-01-01T00:10:00");
  });
});

describe("parseInstant", () => {
  it("reads naive values as UTC instants", () => {
    expect(parseInstant("15/12/2025 12:00")).toBe("2025-12-15T12:00:00.000Z");
  });

  it("normalizes zoned ISO instants", () => {
    expect(parseInstant("2025-12-15T09:00:00-03:00")).toBe("2025-12-15T12:00:00.000Z");
  });

  it("returns null for blanks and garbage", () => {
    expect(parseInstant("   ")).toBeNull();
    expect(parseInstant("yesterday")).toBeNull();
  });
});

describe("text folding", () => {
  it("folds lookups, identities, headers and slugs", () => {
    expect(foldLookup("  São   Paulo ")).toBe("sao paulo");
    expect(foldIdentity("Gol Linhas-Aéreas")).toBe("GOLLINHASAEREAS");
    expect(normalizeHeader("Sigla ICAO Empresa Aérea")).toBe("sigla_icao_empresa_aerea");
    expect(normalizeHeader(" Número  Voo ")).toBe("numero_voo");
    expect(slugifyPart("Aerolíneas Argentinas")).toBe("aerolineas-argentinas");
  });
});
