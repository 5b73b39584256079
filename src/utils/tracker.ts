/**
 * Remap Tracker
 * Unified tracking for task stats and issues
 */

import { writeFile, mkdir } from "fs/promises";
import { join } from "path";
import { ZodError } from "zod";
import {
  ColumnNotFoundError,
  GraphError,
  MappingCoverageError,
  NamingError,
  ReadError,
  RowAlignmentError,
} from "./errors";

// ============================================================================
// Issue Types
// ============================================================================

export type TaskIssueReason =
  | "read-error"
  | "column-not-found"
  | "row-alignment"
  | "unmapped-value"
  | "naming"
  | "graph"
  | "unknown";

export type ResourceIssueReason =
  | "schema-validation"
  | "invalid-json"
  | "read-error";

export interface TaskIssue {
  type: "task";
  path: string; // Task id
  reason: TaskIssueReason;
  details: string;
}

export interface CleanupIssue {
  type: "cleanup";
  path: string;
  reason: "already-missing";
}

export interface ResourceIssue {
  type: "resource";
  path: string;
  reason: ResourceIssueReason;
  details: string;
}

export type Issue = TaskIssue | CleanupIssue | ResourceIssue;
export type IssueType = Issue["type"];

export interface RemapStats {
  totalTasks: number;
  completedTasks: number;
  skippedTasks: number;
  failedTasks: number;
  removedFiles: number;
  issues: Issue[];
  duration: number;
}

// ============================================================================
// Error Mapping (private)
// ============================================================================

interface IssueInfo<T> {
  reason: T;
  details: string;
}

function mapTaskError(error: unknown): IssueInfo<TaskIssueReason> {
  const details = error instanceof Error ? error.message : String(error);

  if (error instanceof ReadError) return { reason: "read-error", details };
  if (error instanceof ColumnNotFoundError) {
    return { reason: "column-not-found", details };
  }
  if (error instanceof RowAlignmentError) {
    return { reason: "row-alignment", details };
  }
  if (error instanceof MappingCoverageError) {
    return { reason: "unmapped-value", details };
  }
  if (error instanceof NamingError) return { reason: "naming", details };
  if (error instanceof GraphError) return { reason: "graph", details };

  return { reason: "unknown", details };
}

function mapResourceError(error: unknown): IssueInfo<ResourceIssueReason> {
  if (error instanceof ZodError) {
    return {
      reason: "schema-validation",
      details: error.issues.map((e) => e.message).join("; "),
    };
  }
  if (error instanceof SyntaxError) {
    return {
      reason: "invalid-json",
      details: error.message,
    };
  }
  return {
    reason: "read-error",
    details: error instanceof Error ? error.message : String(error),
  };
}

// ============================================================================
// Tracker Class
// ============================================================================

export class Tracker {
  private totalTasks = 0;
  private completedTasks = 0;
  private skippedTasks = 0;
  private failedTasks = 0;
  private removedFiles = 0;
  private issues: Issue[] = [];
  private startTime = new Date();

  // ============================================================================
  // Stat counters
  // ============================================================================

  setTotalTasks(count: number): void {
    this.totalTasks = count;
  }

  incrementCompleted(): void {
    this.completedTasks++;
  }

  incrementSkipped(): void {
    this.skippedTasks++;
  }

  incrementRemoved(): void {
    this.removedFiles++;
  }

  // ============================================================================
  // Issue tracking
  // ============================================================================

  trackTaskError(taskId: string, error: unknown): void {
    const { reason, details } = mapTaskError(error);
    this.failedTasks++;
    this.issues.push({ type: "task", path: taskId, reason, details });
  }

  trackResourceError(path: string, error: unknown): void {
    const { reason, details } = mapResourceError(error);
    this.issues.push({ type: "resource", path, reason, details });
  }

  trackMissingFile(path: string): void {
    this.issues.push({ type: "cleanup", path, reason: "already-missing" });
  }

  // ============================================================================
  // Issue getters
  // ============================================================================

  getIssues(): Issue[];
  getIssues<T extends IssueType>(type: T): Extract<Issue, { type: T }>[];
  getIssues(type?: IssueType): Issue[] {
    if (!type) return this.issues;
    return this.issues.filter((i) => i.type === type);
  }

  // ============================================================================
  // Results
  // ============================================================================

  getStats(): RemapStats {
    const duration = Date.now() - this.startTime.getTime();

    return {
      totalTasks: this.totalTasks,
      completedTasks: this.completedTasks,
      skippedTasks: this.skippedTasks,
      failedTasks: this.failedTasks,
      removedFiles: this.removedFiles,
      issues: this.issues,
      duration,
    };
  }

  // ============================================================================
  // Export
  // ============================================================================

  async exportStats(outputDir: string): Promise<void> {
    const { issues, ...summary } = this.getStats();

    const grouped: Record<IssueType, Record<string, Issue[]>> = {
      task: {},
      cleanup: {},
      resource: {},
    };
    for (const issue of issues) {
      const byReason = grouped[issue.type];
      (byReason[issue.reason] ??= []).push(issue);
    }

    await mkdir(outputDir, { recursive: true });
    const outputPath = join(outputDir, "stats.json");
    await writeFile(
      outputPath,
      JSON.stringify({ summary, issues: grouped }, null, 2),
      "utf-8",
    );
  }
}
