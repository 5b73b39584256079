/**
 * Shared option handling for the remap and clean commands
 */

import path from "node:path";
import { z } from "zod";
import { loadConfig, createContext } from "../../utils";
import { Mapper, SourceTable } from "../../modules";
import type { RemapContext } from "../../types";

export const GraphOptionsSchema = z.object({
  columns: z.array(z.string()).min(1),
  output: z.string().optional(),
  name: z.string().optional(),
  tableName: z.string().optional(),
  concurrency: z.coerce.number().int().positive().optional(),
  config: z.string().optional(),
  verbose: z.boolean().optional(),
});

export type GraphOptions = z.infer<typeof GraphOptionsSchema>;

/**
 * Load configuration, apply CLI overrides and build the remap graph
 * Config load errors are tracked, not thrown; defaults are used instead.
 */
export async function buildGraph(
  tablePath: string,
  options: GraphOptions,
): Promise<{ ctx: RemapContext; mapper: Mapper }> {
  const { config, errors } = await loadConfig(options.config);

  if (options.output) {
    config.output.directory = options.output;
  }
  if (options.concurrency) {
    config.scheduler.concurrency = options.concurrency;
  }
  if (options.verbose) {
    config.logging.level = "debug";
  }

  const ctx = createContext(config, { verbose: options.verbose });
  for (const err of errors) {
    ctx.tracker.trackResourceError(err.path, err.error);
  }

  const table = new SourceTable({
    path: tablePath,
    name: options.tableName ?? path.parse(tablePath).name,
  });
  const mapper = new Mapper(
    { table, columns: options.columns, outname: options.name },
    ctx,
  );

  return { ctx, mapper };
}
