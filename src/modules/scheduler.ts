/**
 * Scheduler Module
 * Runs a task graph in dependency order, skipping tasks whose output exists
 */

import { GraphError } from "../utils/errors";
import type { ExecutionResult, GraphPlan, RemapContext, Task } from "../types";

/**
 * Walk the graph from its roots and collect the work still to do
 *
 * A complete task is skipped along with everything upstream of it, so a
 * finished final table is never rebuilt because its intermediates were
 * cleaned up. Tasks are deduplicated by id and returned dependencies first.
 *
 * @throws GraphError if the graph has a cycle
 */
export async function planGraph(roots: readonly Task[]): Promise<GraphPlan> {
  const pending: Task[] = [];
  const skipped: Task[] = [];
  const visited = new Set<string>();
  const visiting = new Set<string>();

  async function visit(task: Task): Promise<void> {
    if (visited.has(task.id)) return;
    if (visiting.has(task.id)) {
      throw new GraphError(`Dependency cycle through ${task.id}`);
    }

    if (await task.complete()) {
      visited.add(task.id);
      skipped.push(task);
      return;
    }

    visiting.add(task.id);
    for (const input of task.inputs()) {
      await visit(input);
    }
    visiting.delete(task.id);

    visited.add(task.id);
    pending.push(task);
  }

  for (const root of roots) {
    await visit(root);
  }

  return { pending, skipped };
}

/**
 * Execute every incomplete task needed by the roots
 *
 * At most `scheduler.concurrency` tasks run at once, and a task starts only
 * after all of its incomplete inputs have finished. After the first failure
 * no new task starts; running tasks settle and the error is rethrown.
 */
export async function execute(
  roots: Task | Task[],
  ctx: RemapContext,
): Promise<ExecutionResult> {
  const { tracker } = ctx;
  const logger = ctx.logger.child("scheduler");
  const limit = ctx.config.scheduler.concurrency;

  const { pending, skipped } = await planGraph(
    Array.isArray(roots) ? roots : [roots],
  );
  const result: ExecutionResult = {
    completed: [],
    skipped: skipped.map((task) => task.id),
  };

  tracker.setTotalTasks(pending.length + skipped.length);
  for (const task of skipped) {
    tracker.incrementSkipped();
    logger.debug(`Skipping ${task.id}: output exists`);
  }

  // Count only inputs that still have to run
  const waitingOn = new Map<string, number>();
  const dependents = new Map<string, Task[]>();
  const pendingIds = new Set(pending.map((task) => task.id));

  for (const task of pending) {
    const inputIds = new Set(
      task.inputs().map((input) => input.id).filter((id) => pendingIds.has(id)),
    );
    waitingOn.set(task.id, inputIds.size);
    for (const id of inputIds) {
      dependents.set(id, [...(dependents.get(id) ?? []), task]);
    }
  }

  const ready = pending.filter((task) => waitingOn.get(task.id) === 0);
  const running = new Set<Promise<void>>();
  let failure: { error: unknown } | undefined;

  async function runTask(task: Task): Promise<void> {
    logger.info(`Running ${task.id}`);
    await task.run();
    result.completed.push(task.id);
    tracker.incrementCompleted();

    for (const dependent of dependents.get(task.id) ?? []) {
      const remaining = (waitingOn.get(dependent.id) ?? 0) - 1;
      waitingOn.set(dependent.id, remaining);
      if (remaining === 0) ready.push(dependent);
    }
  }

  logger.info(`${pending.length} tasks to run, ${skipped.length} already complete`);

  while (ready.length > 0 || running.size > 0) {
    while (!failure && running.size < limit) {
      const task = ready.shift();
      if (!task) break;

      const promise: Promise<void> = runTask(task)
        .catch((error: unknown) => {
          failure ??= { error };
          tracker.trackTaskError(task.id, error);
          logger.error(`Failed ${task.id}`);
        })
        .finally(() => {
          running.delete(promise);
        });
      running.add(promise);
    }

    if (running.size === 0) break;
    await Promise.race(running);
  }

  if (failure) {
    throw failure.error;
  }

  return result;
}
