/**
 * Remap context - shared by every task in the graph and by the CLI
 */

import type { RemapConfig } from "./config";
import type { Logger } from "../utils/logger";
import type { Tracker } from "../utils/tracker";

export type {
  Issue,
  IssueType,
  TaskIssue,
  TaskIssueReason,
  CleanupIssue,
  ResourceIssue,
  ResourceIssueReason,
  RemapStats,
} from "../utils/tracker";

export interface RemapContext {
  config: RemapConfig;
  logger: Logger;
  tracker: Tracker;
  verbose?: boolean;
}
