/**
 * Column Replacer
 * Splices a substituted column back into a full table
 */

import { parseTable, readText, serializeTable } from "../utils/table-io";
import { ColumnNotFoundError, RowAlignmentError } from "../utils/errors";
import { TableTransform, type TableTransformOptions } from "./table-transform";
import { ROW_INDEX_COLUMN, type ValueSubber } from "./value-subber";
import type { RemapContext, Row, Task, TaskKind } from "../types";

export interface ColumnReplacerOptions extends TableTransformOptions {
  replacement: ValueSubber;
}

export class ColumnReplacer extends TableTransform {
  readonly kind: TaskKind = "ColumnReplacer";
  readonly replacement: ValueSubber;

  constructor(options: ColumnReplacerOptions, ctx: RemapContext) {
    super(options, ctx);
    this.replacement = options.replacement;
  }

  protected defaultName(): string {
    return [this.table.tableName, this.column, "splice"].join("-");
  }

  inputs(): readonly Task[] {
    return [this.table, this.replacement];
  }

  /**
   * Overwrite the column's values row by row, aligned on the row index
   * Header order and every other cell are written back unchanged.
   */
  async run(): Promise<void> {
    const table = await this.readInputTable();
    this.requireColumn(table, this.column);

    const replacements = await this.loadReplacements();
    if (replacements.size !== table.rows.length) {
      throw new RowAlignmentError(
        `${this.replacement.output().path} has ${replacements.size} rows, ` +
          `${table.name} has ${table.rows.length}`,
      );
    }

    const rows = table.rows.map((row, index): Row => {
      const value = replacements.get(String(index));
      if (value === undefined) {
        throw new RowAlignmentError(
          `Row ${index} of ${table.name} has no replacement for "${this.column}"`,
        );
      }
      return { ...row, [this.column]: value };
    });

    await this.output().write(
      serializeTable(table.columns, rows, this.format.delimiter),
      this.format.encoding,
    );
  }

  private async loadReplacements(): Promise<Map<string, string>> {
    const target = this.replacement.output();
    const content = await readText(target.path, this.format.encoding);

    const { columns, rows } = parseTable(content, this.format.delimiter, target.path);
    for (const column of [ROW_INDEX_COLUMN, this.column]) {
      if (!columns.includes(column)) {
        throw new ColumnNotFoundError(column, this.replacement.tableName);
      }
    }

    return new Map(rows.map((row) => [row[ROW_INDEX_COLUMN], row[this.column]]));
  }
}
