/**
 * Table type definitions
 */

/**
 * A row maps every column name to its raw cell text.
 * Missing cells are kept as their original token; see `createMissingPredicate`.
 */
export type Row = Record<string, string>;

export interface Table {
  name: string; // Stable table name, used to derive output names
  columns: string[]; // Header, in file order
  rows: Row[];
}

export interface TableFormat {
  delimiter: string;
  encoding: BufferEncoding;
}

/**
 * One id map entry; `value` is null for the missing-value entry
 */
export interface IdMapEntry {
  id: number;
  value: string | null;
}

/**
 * Value → id lookup loaded from a persisted id map
 * The missing-value entry is keyed by null
 */
export type IdLookup = Map<string | null, number>;
