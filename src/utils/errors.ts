/**
 * Pipeline error classes
 *
 * Input and mapping errors are fatal to the task that raises them and
 * propagate through the scheduler; naming and graph errors are raised while
 * the graph is built, before any I/O.
 */

export class RemapError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputError extends RemapError {}

/**
 * A table or id map could not be loaded or parsed
 */
export class ReadError extends InputError {
  constructor(
    readonly path: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Cannot read ${path}: ${message}`, options);
  }
}

export class ColumnNotFoundError extends InputError {
  constructor(
    readonly column: string,
    readonly table: string,
  ) {
    super(`Column "${column}" not found in table "${table}"`);
  }
}

/**
 * A replacement column does not line up with the rows of its table
 */
export class RowAlignmentError extends InputError {}

export class MappingCoverageError extends RemapError {}

export class UnmappedValueError extends MappingCoverageError {
  constructor(
    readonly column: string,
    readonly value: string,
    readonly row: number,
  ) {
    super(`Value "${value}" in column "${column}" (row ${row}) has no id map entry`);
  }
}

export class NamingError extends RemapError {}

export class GraphError extends RemapError {}

/**
 * Check for a Node.js "file not found" error
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}
