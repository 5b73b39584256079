/**
 * Column Id Mapper
 * Produces contiguous ids for a column, one for each distinct value
 */

import { buildIdMap, createMissingPredicate, serializeIdMap } from "../utils/id-map";
import { TableTransform } from "./table-transform";
import type { TaskKind } from "../types";

export class ColumnIdMapper extends TableTransform {
  readonly kind: TaskKind = "ColumnIdMapper";

  protected defaultName(): string {
    return [this.table.tableName, this.column, "idmap"].join("-");
  }

  /**
   * Missing values get their own id, after whichever values precede their
   * first occurrence
   */
  async run(): Promise<void> {
    const table = await this.readInputTable();
    this.requireColumn(table, this.column);

    const isMissing = createMissingPredicate(this.ctx.config.input.missingValues);
    const entries = buildIdMap(
      table.rows.map((row) => row[this.column]),
      isMissing,
    );

    this.ctx.logger.debug(
      `${this.column}: ${entries.length} distinct values in ${table.rows.length} rows`,
    );

    await this.output().write(
      serializeIdMap(this.column, entries, this.format.delimiter),
      this.format.encoding,
    );
  }
}
