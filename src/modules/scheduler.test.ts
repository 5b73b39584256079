import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { execute, planGraph } from "./scheduler";
import { createContext, FileTarget, loadDefaultConfig, Logger } from "../utils";
import { GraphError } from "../utils/errors";
import type { RemapContext, Task } from "../types";

interface Probe {
  order: string[];
  running: number;
  peak: number;
}

class FakeTask implements Task {
  readonly kind = "ColumnIdMapper";
  deps: Task[] = [];
  runs = 0;

  constructor(
    private readonly name: string,
    private readonly dir: string,
    private readonly probe: Probe,
    private readonly fail = false,
  ) {}

  get id(): string {
    return `Fake(${this.name})`;
  }

  inputs(): readonly Task[] {
    return this.deps;
  }

  output(): FileTarget {
    return new FileTarget(join(this.dir, this.name));
  }

  complete(): Promise<boolean> {
    return this.output().exists();
  }

  async run(): Promise<void> {
    this.runs++;
    this.probe.running++;
    this.probe.peak = Math.max(this.probe.peak, this.probe.running);
    await new Promise((resolve) => setTimeout(resolve, 5));
    this.probe.running--;

    if (this.fail) {
      throw new Error(`${this.name} failed`);
    }
    this.probe.order.push(this.name);
    await this.output().write(this.name);
  }
}

describe("scheduler", () => {
  let dir: string;
  let ctx: RemapContext;
  let probe: Probe;

  function task(name: string, deps: Task[] = [], fail = false): FakeTask {
    const t = new FakeTask(name, dir, probe, fail);
    t.deps = deps;
    return t;
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "colremap-sched-"));
    const config = await loadDefaultConfig();
    config.output.directory = dir;
    ctx = createContext(config, { logger: new Logger("error") });
    probe = { order: [], running: 0, peak: 0 };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe("planGraph", () => {
    it("lists dependencies before dependents, once each", async () => {
      const a = task("a");
      const b = task("b", [a]);
      const c = task("c", [a]);
      const d = task("d", [b, c]);

      const { pending, skipped } = await planGraph([d]);

      expect(pending.map((t) => t.id)).toEqual([
        "Fake(a)",
        "Fake(b)",
        "Fake(c)",
        "Fake(d)",
      ]);
      expect(skipped).toEqual([]);
    });

    it("stops at complete tasks without visiting their inputs", async () => {
      const a = task("a");
      const b = task("b", [a]);
      const c = task("c", [b]);
      await writeFile(join(dir, "b"), "done", "utf-8");

      const { pending, skipped } = await planGraph([c]);

      expect(pending).toEqual([c]);
      expect(skipped).toEqual([b]);
    });

    it("rejects a cycle", async () => {
      const a = task("a");
      const b = task("b", [a]);
      a.deps = [b];

      await expect(planGraph([b])).rejects.toBeInstanceOf(GraphError);
    });
  });

  describe("execute", () => {
    it("runs every task after its inputs", async () => {
      const a = task("a");
      const b = task("b", [a]);
      const c = task("c", [b]);

      const result = await execute(c, ctx);

      expect(probe.order).toEqual(["a", "b", "c"]);
      expect(result).toEqual({
        completed: ["Fake(a)", "Fake(b)", "Fake(c)"],
        skipped: [],
      });
    });

    it("does not rerun tasks whose output exists", async () => {
      const a = task("a");
      const b = task("b", [a]);

      await execute(b, ctx);
      const second = await execute(b, ctx);

      expect(a.runs).toBe(1);
      expect(b.runs).toBe(1);
      expect(second).toEqual({ completed: [], skipped: ["Fake(b)"] });
    });

    it("runs independent tasks concurrently up to the limit", async () => {
      ctx.config.scheduler.concurrency = 2;
      const leaves = ["a", "b", "c", "d"].map((name) => task(name));
      const root = task("root", leaves);

      await execute(root, ctx);

      expect(probe.peak).toBe(2);
      expect(probe.order.at(-1)).toBe("root");
    });

    it("runs one task at a time with a limit of one", async () => {
      ctx.config.scheduler.concurrency = 1;
      const root = task("root", [task("a"), task("b"), task("c")]);

      await execute(root, ctx);

      expect(probe.peak).toBe(1);
    });

    it("halts the chain on failure and rethrows the error", async () => {
      const a = task("a");
      const bad = task("bad", [a], true);
      const c = task("c", [bad]);

      await expect(execute(c, ctx)).rejects.toThrow("bad failed");

      expect(probe.order).toEqual(["a"]);
      expect(c.runs).toBe(0);
      expect(ctx.tracker.getIssues("task")).toEqual([
        {
          type: "task",
          path: "Fake(bad)",
          reason: "unknown",
          details: "bad failed",
        },
      ]);
    });

    it("records totals in the tracker", async () => {
      const a = task("a");
      const b = task("b", [a]);
      await writeFile(join(dir, "a"), "done", "utf-8");

      await execute(b, ctx);

      const stats = ctx.tracker.getStats();
      expect(stats.totalTasks).toBe(2);
      expect(stats.completedTasks).toBe(1);
      expect(stats.skippedTasks).toBe(1);
    });
  });
});
