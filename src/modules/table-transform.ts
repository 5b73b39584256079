/**
 * Table Transform
 * Shared base for the tasks that derive a new file from one table column
 */

import { join } from "node:path";
import { FileTarget } from "../utils/file-target";
import { readTable } from "../utils/table-io";
import { ColumnNotFoundError, GraphError } from "../utils/errors";
import type {
  RemapContext,
  Table,
  TableFormat,
  TableTask,
  Task,
  TaskKind,
} from "../types";

export interface TableTransformOptions {
  table: TableTask; // Table the transform reads
  column: string; // Column the transform works on
  outname?: string; // Output filename (without extension); overrides the default
}

export abstract class TableTransform implements TableTask {
  abstract readonly kind: TaskKind;
  readonly table: TableTask;
  readonly column: string;
  private readonly outname?: string;

  constructor(
    options: TableTransformOptions,
    protected readonly ctx: RemapContext,
  ) {
    if (options.column.length === 0) {
      throw new GraphError("Column name must not be empty");
    }
    this.table = options.table;
    this.column = options.column;
    this.outname = options.outname;
  }

  /**
   * Default output name, e.g. "grades-rank-idmap"
   */
  protected abstract defaultName(): string;

  abstract run(): Promise<void>;

  get tableName(): string {
    return this.outname ?? this.defaultName();
  }

  get id(): string {
    return `${this.kind}(${this.output().path})`;
  }

  inputs(): readonly Task[] {
    return [this.table];
  }

  output(): FileTarget {
    const { directory, extension } = this.ctx.config.output;
    return new FileTarget(join(directory, `${this.tableName}${extension}`));
  }

  complete(): Promise<boolean> {
    return this.output().exists();
  }

  protected get format(): TableFormat {
    const { delimiter, encoding } = this.ctx.config.input;
    return { delimiter, encoding };
  }

  protected readInputTable(): Promise<Table> {
    return readTable(this.table.output().path, this.table.tableName, this.format);
  }

  protected requireColumn(table: Table, column: string): void {
    if (!table.columns.includes(column)) {
      throw new ColumnNotFoundError(column, table.name);
    }
  }
}
