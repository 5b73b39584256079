/**
 * Value Subber
 * Substitutes a column's values with the ids of a previously built id map
 */

import { createMissingPredicate, parseIdMap } from "../utils/id-map";
import { readText, serializeTable } from "../utils/table-io";
import { GraphError, UnmappedValueError } from "../utils/errors";
import { TableTransform, type TableTransformOptions } from "./table-transform";
import type { ColumnIdMapper } from "./id-mapper";
import type { IdLookup, RemapContext, Row, Task, TaskKind } from "../types";

// Row position column written next to the substituted values
export const ROW_INDEX_COLUMN = "index";

export interface ValueSubberOptions extends TableTransformOptions {
  idmap: ColumnIdMapper;
  retain?: string[]; // Extra columns copied through unchanged
}

export class ValueSubber extends TableTransform {
  readonly kind: TaskKind = "ValueSubber";
  readonly idmap: ColumnIdMapper;
  readonly retain: string[];

  constructor(options: ValueSubberOptions, ctx: RemapContext) {
    super(options, ctx);
    this.idmap = options.idmap;
    this.retain = (options.retain ?? []).filter((c) => c !== options.column);

    if ([options.column, ...this.retain].includes(ROW_INDEX_COLUMN)) {
      throw new GraphError(
        `Column "${ROW_INDEX_COLUMN}" is reserved for the row index of ${this.tableName}`,
      );
    }
  }

  protected defaultName(): string {
    return [this.table.tableName, this.column, "idsub"].join("-");
  }

  inputs(): readonly Task[] {
    return [this.table, this.idmap];
  }

  /**
   * Replace every value in the column using the id map
   * Nothing is written unless every value has an id.
   */
  async run(): Promise<void> {
    const lookup = await this.loadIdMap();
    const table = await this.readInputTable();
    for (const column of [this.column, ...this.retain]) {
      this.requireColumn(table, column);
    }

    const isMissing = createMissingPredicate(this.ctx.config.input.missingValues);
    const rows = table.rows.map((row, index): Row => {
      const raw = row[this.column];
      const id = lookup.get(isMissing(raw) ? null : raw);
      if (id === undefined) {
        throw new UnmappedValueError(this.column, raw, index);
      }

      const substituted: Row = {
        [ROW_INDEX_COLUMN]: String(index),
        [this.column]: String(id),
      };
      for (const column of this.retain) {
        substituted[column] = row[column];
      }
      return substituted;
    });

    await this.output().write(
      serializeTable(
        [ROW_INDEX_COLUMN, this.column, ...this.retain],
        rows,
        this.format.delimiter,
      ),
      this.format.encoding,
    );
  }

  private async loadIdMap(): Promise<IdLookup> {
    const target = this.idmap.output();
    const content = await readText(target.path, this.format.encoding);
    return parseIdMap(content, this.format.delimiter, target.path);
  }
}
