/**
 * Mapper Module
 * Replaces one or more categorical columns with contiguous integer ids
 */

import { abbreviateNames } from "../utils/abbreviate-names";
import { GraphError } from "../utils/errors";
import { ColumnIdMapper } from "./id-mapper";
import { ValueSubber } from "./value-subber";
import { ColumnReplacer } from "./column-replacer";
import type { CleanupReport, RemapContext, TableTask, Task } from "../types";

export interface MapperOptions {
  table: TableTask;
  columns: readonly string[];
  outname?: string; // Final table name; default: <table>-Map-<abbreviated columns>
}

/**
 * Builds the remap graph for a table
 *
 * Each column marked for mapping gets a chain of three tasks:
 *
 * 1. A ColumnIdMapper assigns contiguous ids to the column's distinct values.
 * 2. A ValueSubber reads the column and its id map, substitutes every value
 *    and writes the substituted column with its row index.
 * 3. A ColumnReplacer splices the substituted column into a full table.
 *
 * Id maps and substitutions always read the original table. Each replacer
 * reads the previous replacer's output, so the splices run in column order
 * and the last one holds every remapped column. The whole graph is built
 * here; nothing runs until the caller hands `finalResult()` to `execute`.
 */
export class Mapper {
  readonly name: string;
  readonly mapperTasks: ColumnIdMapper[] = [];
  readonly subberTasks: ValueSubber[] = [];
  readonly replacerTasks: ColumnReplacer[] = [];
  private readonly finalTask: ColumnReplacer;

  constructor(
    { table, columns, outname }: MapperOptions,
    private readonly ctx: RemapContext,
  ) {
    validateColumns(columns);
    this.name = outname ?? [table.tableName, "Map", abbreviateNames(columns)].join("-");

    let current: TableTask = table;
    columns.forEach((column, index) => {
      const idmapper = new ColumnIdMapper({ table, column }, ctx);
      const subber = new ValueSubber({ table, column, idmap: idmapper }, ctx);
      const replacer = new ColumnReplacer(
        {
          table: current,
          replacement: subber,
          column,
          outname: index === columns.length - 1 ? this.name : undefined,
        },
        ctx,
      );

      this.mapperTasks.push(idmapper);
      this.subberTasks.push(subber);
      this.replacerTasks.push(replacer);
      current = replacer;
    });

    const finalTask = this.replacerTasks.at(-1);
    if (!finalTask) {
      throw new GraphError("No columns to remap");
    }
    this.finalTask = finalTask;
  }

  /**
   * The last splice; its output is the pipeline's final table
   */
  finalResult(): ColumnReplacer {
    return this.finalTask;
  }

  allTasks(): Task[] {
    return [...this.mapperTasks, ...this.subberTasks, ...this.replacerTasks];
  }

  /**
   * Delete every intermediate output, keeping the final table
   * Files that are already gone are reported, not treated as errors.
   */
  async deleteIntermediates(): Promise<CleanupReport> {
    const { logger, tracker } = this.ctx;
    const report: CleanupReport = { removed: [], missing: [] };

    for (const task of this.allTasks()) {
      if (task === this.finalTask) continue;

      const { path } = task.output();
      if (await task.output().remove()) {
        report.removed.push(path);
        tracker.incrementRemoved();
        logger.debug(`Removed ${path}`);
      } else {
        report.missing.push(path);
        tracker.trackMissingFile(path);
        logger.warn(`Intermediate already missing: ${path}`);
      }
    }

    return report;
  }
}

function validateColumns(columns: readonly string[]): void {
  if (columns.length === 0) {
    throw new GraphError("No columns to remap");
  }

  const seen = new Set<string>();
  for (const column of columns) {
    if (column.length === 0) {
      throw new GraphError("Column name must not be empty");
    }
    if (seen.has(column)) {
      throw new GraphError(`Duplicate column "${column}"`);
    }
    seen.add(column);
  }
}
