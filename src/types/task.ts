/**
 * Task graph type definitions
 */

import type { FileTarget } from "../utils/file-target";

export type TaskKind =
  | "SourceTable"
  | "ColumnIdMapper"
  | "ValueSubber"
  | "ColumnReplacer";

/**
 * A unit of work in the remap graph
 *
 * Dependencies are returned by identity from `inputs()`; a task is complete
 * once its output exists, and the scheduler never runs a complete task.
 */
export interface Task {
  readonly id: string;
  readonly kind: TaskKind;
  inputs(): readonly Task[];
  output(): FileTarget;
  complete(): Promise<boolean>;
  run(): Promise<void>;
}

/**
 * A task whose output is a table other tasks can read
 */
export interface TableTask extends Task {
  // Name used to derive the default output names of downstream tasks
  readonly tableName: string;
}

export interface ExecutionResult {
  completed: string[]; // Ids of tasks run during this execution
  skipped: string[]; // Ids of tasks whose output already existed
}

export interface GraphPlan {
  pending: Task[]; // Incomplete tasks, dependencies first
  skipped: Task[];
}

export interface CleanupReport {
  removed: string[]; // Paths deleted
  missing: string[]; // Paths that were already absent
}
