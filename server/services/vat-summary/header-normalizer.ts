import {
  CANONICAL_FIELDS,
  HEADER_ALIASES,
  type CanonicalField,
} from "@shared/constants";
import type { RawCell } from "@shared/schema";

/**
 * Column positions of the canonical fields in one sheet.
 * A field without a position is synthesized as an empty column.
 */
export type CanonicalColumnMap = Partial<Record<CanonicalField, number>>;

export interface HeaderMapping {
  /** Cleaned header text per column, after alias substitution */
  headers: string[];
  columns: CanonicalColumnMap;
}

function aliasKey(header: string): string {
  return header.toLowerCase().replace(/\s+/g, " ");
}

const ALIAS_LOOKUP: ReadonlyMap<string, CanonicalField> = new Map(
  Object.entries(HEADER_ALIASES).map(([surface, canonical]) => [aliasKey(surface), canonical])
);

/**
 * NFKD-normalize, turn non-breaking spaces into plain spaces, trim.
 */
export function normalizeHeader(header: RawCell | undefined): string {
  if (header === null || header === undefined) {
    return "";
  }
  const text = header instanceof Date ? header.toISOString() : String(header);
  return text.normalize("NFKD").replace(/\u00A0/g, " ").trim();
}

/**
 * Canonical field for a cleaned header, or the header itself when unknown.
 */
export function resolveHeaderAlias(
  header: string,
  extraAliases: ReadonlyMap<string, CanonicalField> = new Map()
): string {
  const key = aliasKey(header);
  return ALIAS_LOOKUP.get(key) ?? extraAliases.get(key) ?? header;
}

/**
 * Build the advisory alias lookup in the same key space as the static table.
 */
export function toAliasLookup(aliases: Readonly<Record<string, CanonicalField>>): Map<string, CanonicalField> {
  return new Map(Object.entries(aliases).map(([surface, canonical]) => [aliasKey(normalizeHeader(surface)), canonical]));
}

/**
 * Normalize a header row and locate each canonical field. The left-most
 * column wins when two headers resolve to the same field.
 */
export function mapHeaderRow(
  headerRow: readonly RawCell[],
  extraAliases?: ReadonlyMap<string, CanonicalField>
): HeaderMapping {
  const headers = headerRow.map(cell => resolveHeaderAlias(normalizeHeader(cell), extraAliases));
  const columns: CanonicalColumnMap = {};

  headers.forEach((header, index) => {
    for (const field of CANONICAL_FIELDS) {
      if (header === field && columns[field] === undefined) {
        columns[field] = index;
      }
    }
  });

  return { headers, columns };
}

/**
 * Headers that did not resolve to a canonical field (candidates for the
 * optional mapping hint).
 */
export function unmappedHeaders(mapping: HeaderMapping): string[] {
  const canonical = new Set<string>(CANONICAL_FIELDS);
  return mapping.headers.filter(header => header !== "" && !canonical.has(header));
}
