/**
 * Clean command - Deletes the intermediate files of a previous run
 */

import ora from "ora";
import { buildGraph, GraphOptionsSchema, type GraphOptions } from "./options";

export async function cleanCommand(table: string, opts: GraphOptions): Promise<void> {
  const spinner = ora({ text: "Cleaning intermediates...", indent: 2 }).start();

  try {
    const options = GraphOptionsSchema.parse(opts);
    const { mapper } = await buildGraph(table, options);
    const { removed, missing } = await mapper.deleteIntermediates();

    spinner.succeed(
      `Removed ${removed.length} files (${missing.length} already missing)`,
    );
  } catch (error) {
    spinner.fail("Clean failed");
    console.error(error);
    process.exit(1);
  }
}
