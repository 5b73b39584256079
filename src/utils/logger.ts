/**
 * Logger Utility
 * Handles console output with different log levels
 */

import type { LogLevel } from "../types/config";

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export class Logger {
  constructor(
    private readonly level: LogLevel = "info",
    private readonly scope?: string,
  ) {}

  /**
   * Create a logger that prefixes every message with a scope
   *
   * @example
   * logger.child("scheduler").info("Running 6 tasks")
   * // [INFO] scheduler: Running 6 tasks
   */
  child(scope: string): Logger {
    return new Logger(this.level, this.scope ? `${this.scope}:${scope}` : scope);
  }

  debug(message: string): void {
    if (this.enabled("debug")) {
      console.log(`[DEBUG] ${this.format(message)}`);
    }
  }

  info(message: string): void {
    if (this.enabled("info")) {
      console.log(`[INFO] ${this.format(message)}`);
    }
  }

  warn(message: string): void {
    if (this.enabled("warn")) {
      console.warn(`[WARN] ${this.format(message)}`);
    }
  }

  error(message: string, error?: unknown): void {
    console.error(`[ERROR] ${this.format(message)}`);
    if (error) {
      console.error(error);
    }
  }

  private enabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  private format(message: string): string {
    return this.scope ? `${this.scope}: ${message}` : message;
  }
}
