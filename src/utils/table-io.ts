/**
 * Table I/O
 * Parses and writes delimited tables with papaparse
 */

import { readFile } from "fs/promises";
import Papa from "papaparse";
import { ReadError } from "./errors";
import type { Row, Table, TableFormat } from "../types";

export interface ParsedTable {
  columns: string[];
  rows: Row[];
}

/**
 * Split delimited text into records
 *
 * A single trailing newline is ignored. Blank lines are kept as one-field
 * records only when the header has one column, where they are empty (missing)
 * cells; in wider tables they are dropped.
 *
 * @param source - Path or name used in error messages
 * @throws ReadError on an empty input or a parse failure
 */
export function parseRecords(
  content: string,
  delimiter: string,
  source: string,
): string[][] {
  const body = content.replace(/\r?\n$/, "");
  if (body.length === 0) {
    throw new ReadError(source, "table has no header");
  }

  // Line endings are guessed by papaparse, outside quoted fields
  const { data, errors } = Papa.parse<string[]>(body, {
    delimiter,
    skipEmptyLines: false,
  });

  const parseError = errors[0];
  if (parseError) {
    throw new ReadError(source, `${parseError.message} (row ${parseError.row})`);
  }

  const [header] = data;
  if (header && header.length > 1) {
    return data.filter((record) => !isBlankRecord(record));
  }
  return data;
}

function isBlankRecord(record: readonly string[]): boolean {
  return record.length === 1 && record[0] === "";
}

/**
 * Parse delimited text into a header and rows
 *
 * @throws ReadError on an empty input, a duplicate header or a ragged row
 */
export function parseTable(
  content: string,
  delimiter: string,
  source: string,
): ParsedTable {
  const [header, ...records] = parseRecords(content, delimiter, source);
  if (!header) {
    throw new ReadError(source, "table has no header");
  }

  const seen = new Set<string>();
  for (const column of header) {
    if (seen.has(column)) {
      throw new ReadError(source, `duplicate column "${column}"`);
    }
    seen.add(column);
  }

  const rows = records.map((record, index) => {
    if (record.length !== header.length) {
      throw new ReadError(
        source,
        `row ${index} has ${record.length} fields, expected ${header.length}`,
      );
    }
    const row: Row = {};
    header.forEach((column, i) => {
      row[column] = record[i];
    });
    return row;
  });

  return { columns: header, rows };
}

/**
 * Serialize a header and positional records, with "\n" line endings and a
 * trailing newline
 */
export function serializeRecords(
  header: readonly string[],
  records: readonly string[][],
  delimiter: string,
): string {
  const text = Papa.unparse([[...header], ...records], {
    delimiter,
    newline: "\n",
  });
  return `${text}\n`;
}

/**
 * Serialize rows under the given header
 */
export function serializeTable(
  columns: readonly string[],
  rows: readonly Row[],
  delimiter: string,
): string {
  const records = rows.map((row) => columns.map((column) => row[column] ?? ""));
  return serializeRecords(columns, records, delimiter);
}

/**
 * Read a table-like file as text
 *
 * @throws ReadError wrapping the filesystem error
 */
export async function readText(
  path: string,
  encoding: BufferEncoding,
): Promise<string> {
  try {
    return await readFile(path, encoding);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ReadError(path, message, { cause: error });
  }
}

/**
 * Load a table from disk
 *
 * @throws ReadError when the file is missing, unreadable or malformed
 */
export async function readTable(
  path: string,
  name: string,
  format: TableFormat,
): Promise<Table> {
  const content = await readText(path, format.encoding);
  const { columns, rows } = parseTable(content, format.delimiter, path);
  return { name, columns, rows };
}
