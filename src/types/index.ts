/**
 * Central type exports
 */

// Configuration
export type {
  RemapConfig,
  PartialRemapConfig,
  InputConfig,
  OutputConfig,
  SchedulerConfig,
  LoggingConfig,
  LogLevel,
  ConfigError,
} from "./config";
export {
  RemapConfigSchema,
  PartialRemapConfigSchema,
} from "./config";

// Tables
export type { Row, Table, TableFormat, IdMapEntry, IdLookup } from "./table";

// Tasks
export type {
  Task,
  TaskKind,
  TableTask,
  ExecutionResult,
  GraphPlan,
  CleanupReport,
} from "./task";

// Context
export type {
  RemapContext,
  Issue,
  IssueType,
  TaskIssue,
  TaskIssueReason,
  CleanupIssue,
  ResourceIssue,
  ResourceIssueReason,
  RemapStats,
} from "./context";
