/**
 * Configuration type definitions with Zod schemas
 */

import { z } from "zod";

// Zod schemas
export const InputConfigSchema = z.object({
  // Single-character field delimiter used for every table read and written
  delimiter: z.string().length(1),
  encoding: z.enum(["utf-8", "utf8", "latin1", "ascii", "utf16le"]),
  // Cell values treated as missing (the empty cell is always missing)
  missingValues: z.array(z.string()),
});

export const OutputConfigSchema = z.object({
  directory: z.string(),
  extension: z.string(),
  retainIntermediates: z.boolean(),
});

export const SchedulerConfigSchema = z.object({
  concurrency: z.number().int().positive(),
});

export const LoggingConfigSchema = z.object({
  level: z.enum(["debug", "info", "warn", "error"]),
});

export const RemapConfigSchema = z.object({
  input: InputConfigSchema,
  output: OutputConfigSchema,
  scheduler: SchedulerConfigSchema,
  logging: LoggingConfigSchema,
});

// Partial schema for user/custom configs (top-level AND nested properties optional)
export const PartialRemapConfigSchema = RemapConfigSchema.partial().extend({
  input: InputConfigSchema.partial().optional(),
  output: OutputConfigSchema.partial().optional(),
  scheduler: SchedulerConfigSchema.partial().optional(),
  logging: LoggingConfigSchema.partial().optional(),
});

// Infer TypeScript types from Zod schemas
export type InputConfig = z.infer<typeof InputConfigSchema>;
export type OutputConfig = z.infer<typeof OutputConfigSchema>;
export type SchedulerConfig = z.infer<typeof SchedulerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = LoggingConfig["level"];
export type RemapConfig = z.infer<typeof RemapConfigSchema>;
export type PartialRemapConfig = z.infer<typeof PartialRemapConfigSchema>;

export interface ConfigError {
  path: string;
  error: unknown;
}
