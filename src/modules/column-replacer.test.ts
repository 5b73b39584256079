import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ColumnIdMapper } from "./id-mapper";
import { ValueSubber } from "./value-subber";
import { ColumnReplacer } from "./column-replacer";
import { SourceTable } from "./source-table";
import { createContext, loadDefaultConfig, Logger } from "../utils";
import { ColumnNotFoundError, RowAlignmentError } from "../utils/errors";
import type { RemapContext } from "../types";

describe("ColumnReplacer", () => {
  let dir: string;
  let ctx: RemapContext;
  let table: SourceTable;
  let subber: ValueSubber;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "colremap-splice-"));
    const config = await loadDefaultConfig();
    config.output.directory = dir;
    ctx = createContext(config, { logger: new Logger("error") });

    const path = join(dir, "grades.csv");
    await writeFile(path, "name,grade,year\nann,A,1\nbo,B,2\ncy,A,3\n", "utf-8");
    table = new SourceTable({ path, name: "grades" });
    const idmap = new ColumnIdMapper({ table, column: "grade" }, ctx);
    subber = new ValueSubber({ table, column: "grade", idmap }, ctx);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("depends on its table and the substituted column", () => {
    const task = new ColumnReplacer({ table, column: "grade", replacement: subber }, ctx);

    expect(task.inputs()).toEqual([table, subber]);
    expect(task.tableName).toBe("grades-grade-splice");
  });

  it("replaces the column in place, keeping header order and other cells", async () => {
    await writeFile(subber.output().path, "index,grade\n0,0\n1,1\n2,0\n", "utf-8");
    const task = new ColumnReplacer({ table, column: "grade", replacement: subber }, ctx);
    await task.run();

    expect(await readFile(task.output().path, "utf-8")).toBe(
      "name,grade,year\nann,0,1\nbo,1,2\ncy,0,3\n",
    );
  });

  it("aligns replacements on the row index, not on file order", async () => {
    await writeFile(subber.output().path, "index,grade\n2,7\n0,5\n1,6\n", "utf-8");
    const task = new ColumnReplacer({ table, column: "grade", replacement: subber }, ctx);
    await task.run();

    expect(await readFile(task.output().path, "utf-8")).toBe(
      "name,grade,year\nann,5,1\nbo,6,2\ncy,7,3\n",
    );
  });

  it("fails when the replacement does not cover every row", async () => {
    await writeFile(subber.output().path, "index,grade\n0,0\n1,1\n", "utf-8");
    const task = new ColumnReplacer({ table, column: "grade", replacement: subber }, ctx);

    await expect(task.run()).rejects.toBeInstanceOf(RowAlignmentError);
  });

  it("fails when a row index is missing from the replacement", async () => {
    await writeFile(subber.output().path, "index,grade\n0,0\n1,1\n5,0\n", "utf-8");
    const task = new ColumnReplacer({ table, column: "grade", replacement: subber }, ctx);

    await expect(task.run()).rejects.toThrow(
      'Row 2 of grades has no replacement for "grade"',
    );
  });

  it("fails when the column is absent from the table", async () => {
    await writeFile(subber.output().path, "index,rank\n0,0\n1,1\n2,0\n", "utf-8");
    const task = new ColumnReplacer({ table, column: "rank", replacement: subber }, ctx);

    await expect(task.run()).rejects.toBeInstanceOf(ColumnNotFoundError);
  });
});
