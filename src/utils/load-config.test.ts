import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { loadConfig, loadDefaultConfig, mergeConfig } from "./load-config";

describe("loadDefaultConfig", () => {
  it("loads the bundled defaults", async () => {
    const config = await loadDefaultConfig();

    expect(config.input.delimiter).toBe(",");
    expect(config.input.missingValues).toContain("NA");
    expect(config.output.extension).toBe("");
    expect(config.scheduler.concurrency).toBe(4);
  });
});

describe("mergeConfig", () => {
  it("overrides nested keys without dropping their siblings", async () => {
    const base = await loadDefaultConfig();
    const merged = mergeConfig(base, {
      input: { delimiter: ";" },
      scheduler: { concurrency: 1 },
    });

    expect(merged.input).toEqual({ ...base.input, delimiter: ";" });
    expect(merged.scheduler.concurrency).toBe(1);
    expect(merged.output).toEqual(base.output);
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "colremap-config-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("applies a custom config file over the defaults", async () => {
    const path = join(dir, "custom.json");
    await writeFile(
      path,
      JSON.stringify({ output: { directory: "/tmp/remapped", extension: ".csv" } }),
      "utf-8",
    );

    const { config } = await loadConfig(path);

    expect(config.output.directory).toBe("/tmp/remapped");
    expect(config.output.extension).toBe(".csv");
    expect(config.input.delimiter).toBe(",");
  });

  it("reports an invalid custom config and keeps the defaults for it", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, JSON.stringify({ input: { delimiter: "||" } }), "utf-8");

    const { config, errors } = await loadConfig(path);

    expect(config.input.delimiter).toBe(",");
    expect(errors.map((e) => e.path)).toContain(path);
  });

  it("reports a custom config that is not JSON", async () => {
    const path = join(dir, "broken.json");
    await writeFile(path, "{ not json", "utf-8");

    const { errors } = await loadConfig(path);
    const error = errors.find((e) => e.path === path)?.error;

    expect(error).toBeInstanceOf(SyntaxError);
  });
});
