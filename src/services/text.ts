/**
 * text.ts — Text folding shared by lookups, keys, slugs and column matching.
 */

/** "Aérea" → "Aerea". */
export function stripDiacritics(value: string): string {
  return value.normalize("NFKD").replace(/[\u0300-\u036f]/g, "");
}

/** Case- and accent-insensitive lookup form: "  São Paulo " → "sao paulo". */
export function foldLookup(value: string): string {
  return stripDiacritics(value).trim().toLowerCase().replace(/\s+/g, " ");
}

/** Identity form: upper-case alphanumerics only. "Gol Linhas-Aéreas" → "GOLLINHASAEREAS". */
export function foldIdentity(value: string): string {
  return stripDiacritics(value).toUpperCase().replace(/[^A-Z0-9]/g, "");
}

/**
 * Header form used for column matching:
 * "Sigla ICAO Empresa Aérea" → "sigla_icao_empresa_aerea".
 */
export function normalizeHeader(value: string): string {
  return stripDiacritics(value)
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9_]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_+|_+$/g, "");
}

/** URL-safe lower-case slug part: "Aerolíneas Argentinas" → "aerolineas-argentinas". */
export function slugifyPart(value: string): string {
  return stripDiacritics(value)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}
