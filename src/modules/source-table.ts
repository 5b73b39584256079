/**
 * Source Table
 * Graph leaf for a table file that already exists
 */

import { FileTarget } from "../utils/file-target";
import { ReadError } from "../utils/errors";
import type { TableTask } from "../types";

export interface SourceTableOptions {
  path: string;
  name: string;
}

export class SourceTable implements TableTask {
  readonly kind = "SourceTable";
  readonly tableName: string;
  private readonly target: FileTarget;

  constructor({ path, name }: SourceTableOptions) {
    this.tableName = name;
    this.target = new FileTarget(path);
  }

  get id(): string {
    return `${this.kind}(${this.target.path})`;
  }

  inputs(): readonly [] {
    return [];
  }

  output(): FileTarget {
    return this.target;
  }

  complete(): Promise<boolean> {
    return this.target.exists();
  }

  /**
   * An external input cannot be produced; reaching this means it is missing
   */
  async run(): Promise<void> {
    throw new ReadError(this.target.path, "source table does not exist");
  }
}
