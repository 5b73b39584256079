/**
 * Stats Module
 * Displays remap statistics and issues
 */

import chalk from "chalk";
import type { RemapContext, RemapStats } from "../types";
import type { Tracker } from "../utils/tracker";

// ============================================================================
// Formatting Helpers
// ============================================================================

/**
 * Format duration in a human-readable way
 */
function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }
  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = (seconds % 60).toFixed(0);
  return `${minutes}m ${remainingSeconds}s`;
}

function progressBar(current: number, total: number, width: number = 24): string {
  if (total === 0) return chalk.dim("─".repeat(width));

  const percentage = current / total;
  const filled = Math.round(width * percentage);
  const percentText = `${Math.round(percentage * 100)}%`;

  return `${chalk.green("━".repeat(filled))}${chalk.dim("━".repeat(width - filled))} ${chalk.dim(percentText)}`;
}

function statRow(
  icon: string,
  label: string,
  value: string | number,
  color: (s: string) => string = chalk.white,
): string {
  return `   ${icon} ${chalk.dim(label.padEnd(18))} ${color(String(value))}`;
}

function sectionHeader(title: string): string {
  return `\n  ${chalk.bold.white(title)}`;
}

// ============================================================================
// Main Stats Display
// ============================================================================

/**
 * Export stats to JSON and display a summary of the run
 *
 * @param finalPath - Path of the final table, shown in the summary
 */
export async function stats(ctx: RemapContext, finalPath: string): Promise<void> {
  const { config, tracker, verbose } = ctx;
  await tracker.exportStats(config.output.directory);

  const summary = tracker.getStats();
  const hasErrors = summary.failedTasks > 0;
  const hasWarnings = tracker.getIssues("cleanup").length > 0;

  console.log("");

  const statusIcon = hasErrors
    ? chalk.red("✖")
    : hasWarnings
      ? chalk.yellow("◆")
      : chalk.green("✔");

  console.log(
    `  ${statusIcon} ${chalk.bold(hasErrors ? "Remap Failed" : "Remap Complete")} ${chalk.dim("·")} ${chalk.dim(formatDuration(summary.duration))}`,
  );
  console.log(`   ${chalk.dim("→")} ${finalPath}`);

  displayTasksSection(summary);
  displayCleanupSection(tracker, summary, verbose);
  displayIssuesSection(tracker, verbose);

  console.log("");
}

// ============================================================================
// Section Displays
// ============================================================================

function displayTasksSection(summary: RemapStats): void {
  console.log(sectionHeader("Tasks"));

  const done = summary.completedTasks + summary.skippedTasks;
  console.log(`   ${progressBar(done, summary.totalTasks)}`);

  console.log(statRow(chalk.green("◉"), "Ran", summary.completedTasks, chalk.green));

  if (summary.skippedTasks > 0) {
    console.log(
      statRow(chalk.cyan("◉"), "Already complete", summary.skippedTasks, chalk.cyan),
    );
  }

  if (summary.failedTasks > 0) {
    console.log(statRow(chalk.red("◉"), "Failed", summary.failedTasks, chalk.red));
  }
}

function displayCleanupSection(
  tracker: Tracker,
  summary: RemapStats,
  verbose?: boolean,
): void {
  const missing = tracker.getIssues("cleanup");
  if (summary.removedFiles === 0 && missing.length === 0) {
    return;
  }

  console.log(sectionHeader("Cleanup"));
  console.log(statRow(chalk.green("◉"), "Removed", summary.removedFiles, chalk.green));

  if (missing.length > 0) {
    console.log(
      statRow(chalk.yellow("◉"), "Already missing", missing.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of missing) {
        console.log(`      ${chalk.dim("·")} ${issue.path}`);
      }
    }
  }
}

function displayIssuesSection(tracker: Tracker, verbose?: boolean): void {
  const taskIssues = tracker.getIssues("task");
  const resourceIssues = tracker.getIssues("resource");

  if (taskIssues.length === 0 && resourceIssues.length === 0) {
    return;
  }

  console.log(sectionHeader(chalk.red("Errors")));

  if (taskIssues.length > 0) {
    console.log(statRow(chalk.red("✖"), "Tasks failed", taskIssues.length, chalk.red));
    for (const issue of taskIssues) {
      console.log(`      ${chalk.dim("·")} ${issue.path}`);
      console.log(`        ${chalk.dim(issue.details)}`);
    }
  }

  if (resourceIssues.length > 0) {
    console.log(
      statRow(chalk.yellow("✖"), "Config failed", resourceIssues.length, chalk.yellow),
    );
    if (verbose) {
      for (const issue of resourceIssues) {
        console.log(`      ${chalk.dim("·")} ${issue.path}: ${issue.details}`);
      }
    }
  }
}
