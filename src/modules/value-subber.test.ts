import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ColumnIdMapper } from "./id-mapper";
import { ValueSubber } from "./value-subber";
import { SourceTable } from "./source-table";
import { createContext, fileExists, loadDefaultConfig, Logger } from "../utils";
import {
  ColumnNotFoundError,
  GraphError,
  MappingCoverageError,
  ReadError,
  UnmappedValueError,
} from "../utils/errors";
import type { RemapContext } from "../types";

describe("ValueSubber", () => {
  let dir: string;
  let ctx: RemapContext;
  let table: SourceTable;
  let idmap: ColumnIdMapper;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "colremap-sub-"));
    const config = await loadDefaultConfig();
    config.output.directory = dir;
    ctx = createContext(config, { logger: new Logger("error") });

    const path = join(dir, "grades.csv");
    await writeFile(path, "name,grade\nann,A\nbo,B\ncy,A\ndi,C\ned,\n", "utf-8");
    table = new SourceTable({ path, name: "grades" });
    idmap = new ColumnIdMapper({ table, column: "grade" }, ctx);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("depends on its table and the id map task", () => {
    const task = new ValueSubber({ table, column: "grade", idmap }, ctx);

    expect(task.inputs()).toEqual([table, idmap]);
    expect(task.output().path).toBe(join(dir, "grades-grade-idsub"));
  });

  it("substitutes every value with its id, keeping the row index", async () => {
    await idmap.run();
    const task = new ValueSubber({ table, column: "grade", idmap }, ctx);
    await task.run();

    expect(await readFile(task.output().path, "utf-8")).toBe(
      "index,grade\n0,0\n1,1\n2,0\n3,2\n4,3\n",
    );
  });

  it("writes retained columns after the substituted one", async () => {
    await idmap.run();
    const task = new ValueSubber(
      { table, column: "grade", idmap, retain: ["name"] },
      ctx,
    );
    await task.run();

    expect(await readFile(task.output().path, "utf-8")).toBe(
      "index,grade,name\n0,0,ann\n1,1,bo\n2,0,cy\n3,2,di\n4,3,ed\n",
    );
  });

  it("fails on a value the id map does not cover and writes nothing", async () => {
    await writeFile(idmap.output().path, "id,grade\n0,A\n1,B\n2,\n", "utf-8");
    const task = new ValueSubber({ table, column: "grade", idmap }, ctx);

    const run = task.run();
    await expect(run).rejects.toBeInstanceOf(MappingCoverageError);
    await expect(run).rejects.toThrow(
      'Value "C" in column "grade" (row 3) has no id map entry',
    );
    expect(await fileExists(task.output().path)).toBe(false);
  });

  it("reports the unmapped value", async () => {
    await writeFile(idmap.output().path, "id,grade\n0,A\n", "utf-8");
    const task = new ValueSubber({ table, column: "grade", idmap }, ctx);

    await expect(task.run()).rejects.toMatchObject({
      column: "grade",
      value: "B",
      row: 1,
    });
    await expect(task.run()).rejects.toBeInstanceOf(UnmappedValueError);
  });

  it("fails with ReadError when the id map is missing", async () => {
    const task = new ValueSubber({ table, column: "grade", idmap }, ctx);
    await expect(task.run()).rejects.toBeInstanceOf(ReadError);
  });

  it("fails with ColumnNotFoundError for an absent retained column", async () => {
    await idmap.run();
    const task = new ValueSubber(
      { table, column: "grade", idmap, retain: ["age"] },
      ctx,
    );
    await expect(task.run()).rejects.toBeInstanceOf(ColumnNotFoundError);
  });

  it("rejects a column that collides with the row index", () => {
    expect(
      () => new ValueSubber({ table, column: "index", idmap }, ctx),
    ).toThrow(GraphError);
  });
});
