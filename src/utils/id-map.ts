/**
 * Id Map Utilities
 * Contiguous id assignment and the persisted (id, value) format
 */

import { ReadError } from "./errors";
import { parseRecords, serializeRecords } from "./table-io";
import type { IdLookup, IdMapEntry } from "../types";

export const ID_COLUMN = "id";

// Persisted form of the single missing-value entry
export const MISSING_SENTINEL = "";

export type MissingPredicate = (value: string) => boolean;

/**
 * Build a predicate for missing cells
 * The empty cell is always missing, whatever the configured tokens are.
 *
 * @example
 * const isMissing = createMissingPredicate(["NA"]);
 * isMissing("NA") // true
 * isMissing("") // true
 * isMissing("na") // false
 */
export function createMissingPredicate(
  tokens: readonly string[],
): MissingPredicate {
  const missing = new Set([MISSING_SENTINEL, ...tokens]);
  return (value) => missing.has(value);
}

/**
 * Assign contiguous ids to the distinct values of a column
 * Ids follow first-occurrence order; every missing token shares one entry.
 *
 * @example
 * buildIdMap(["A", "B", "A", "C", ""], isMissing)
 * // [{id: 0, value: "A"}, {id: 1, value: "B"}, {id: 2, value: "C"}, {id: 3, value: null}]
 */
export function buildIdMap(
  values: readonly string[],
  isMissing: MissingPredicate,
): IdMapEntry[] {
  const seen = new Set<string | null>();
  const entries: IdMapEntry[] = [];

  for (const raw of values) {
    const value = isMissing(raw) ? null : raw;
    if (seen.has(value)) continue;
    seen.add(value);
    entries.push({ id: entries.length, value });
  }

  return entries;
}

/**
 * Write id map entries as `id,<column>` records in id order
 */
export function serializeIdMap(
  column: string,
  entries: readonly IdMapEntry[],
  delimiter: string,
): string {
  const records = entries.map(({ id, value }) => [
    String(id),
    value ?? MISSING_SENTINEL,
  ]);
  return serializeRecords([ID_COLUMN, column], records, delimiter);
}

/**
 * Load a persisted id map as a value → id lookup
 *
 * The header row is skipped. Ids must be exactly 0..k-1 in file order and
 * values must be distinct; anything else is a malformed map.
 *
 * @throws ReadError if the map is malformed
 */
export function parseIdMap(
  content: string,
  delimiter: string,
  source: string,
): IdLookup {
  const [, ...records] = parseRecords(content, delimiter, source);
  const lookup: IdLookup = new Map();

  records.forEach((record, position) => {
    const [id, value] = record;
    if (record.length !== 2 || id !== String(position)) {
      throw new ReadError(source, `malformed id map entry at position ${position}`);
    }

    const key = value === MISSING_SENTINEL ? null : value;
    if (lookup.has(key)) {
      throw new ReadError(source, `duplicate id map value "${value}"`);
    }
    lookup.set(key, position);
  });

  return lookup;
}

/**
 * Turn entries back into the value → id lookup used for substitution
 */
export function toLookup(entries: readonly IdMapEntry[]): IdLookup {
  return new Map(entries.map(({ id, value }) => [value, id]));
}
