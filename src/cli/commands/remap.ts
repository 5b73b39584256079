/**
 * Remap command - Builds the remap graph and runs it
 */

import ora from "ora";
import chalk from "chalk";
import { z } from "zod";
import * as modules from "../../modules";
import { buildGraph, GraphOptionsSchema } from "./options";
import type { Mapper } from "../../modules";
import type { RemapContext } from "../../types";

const RemapOptionsSchema = GraphOptionsSchema.extend({
  retainIntermediates: z.boolean().optional(),
  dryRun: z.boolean().optional(),
});

type Options = z.infer<typeof RemapOptionsSchema>;

function printGraph(mapper: Mapper): void {
  console.log(`  ${chalk.bold(mapper.name)}`);
  for (const task of mapper.allTasks()) {
    const inputs = task.inputs().map((input) => input.output().path);
    console.log(`   ${chalk.cyan(task.kind.padEnd(15))} ${task.output().path}`);
    console.log(`   ${" ".repeat(15)} ${chalk.dim(`← ${inputs.join(", ")}`)}`);
  }
}

export async function remapCommand(table: string, opts: Options): Promise<void> {
  const spinner = ora({ text: "Initializing...", indent: 2 }).start();
  let run: { ctx: RemapContext; mapper: Mapper } | undefined;

  try {
    const options = RemapOptionsSchema.parse(opts);

    spinner.text = "Building task graph...";
    run = await buildGraph(table, options);
    const { ctx, mapper } = run;

    if (options.dryRun) {
      spinner.stop();
      printGraph(mapper);
      return;
    }

    // Task logs would interleave with the spinner frames
    spinner.stop();
    await modules.execute(mapper.finalResult(), ctx);

    const retain =
      options.retainIntermediates ?? ctx.config.output.retainIntermediates;
    if (!retain) {
      await mapper.deleteIntermediates();
    }

    await modules.stats(ctx, mapper.finalResult().output().path);
  } catch (error) {
    spinner.fail("Remap failed");
    console.error(error);

    // Failed tasks are already tracked; report them before exiting
    if (run) {
      await reportFailure(run.ctx, run.mapper);
    }
    process.exit(1);
  }
}

async function reportFailure(ctx: RemapContext, mapper: Mapper): Promise<void> {
  try {
    await modules.stats(ctx, mapper.finalResult().output().path);
  } catch (error) {
    ctx.logger.error("Could not export stats", error);
  }
}
