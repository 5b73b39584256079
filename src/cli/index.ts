#!/usr/bin/env tsx

/**
 * CLI entry point for colremap
 * Handles command-line argument parsing and user interaction
 */

import { Command } from "commander";
import { remapCommand } from "./commands/remap";
import { cleanCommand } from "./commands/clean";
import { configCommand } from "./commands/config";

const program = new Command();

program
  .name("colremap")
  .description("Replace categorical table columns with contiguous integer ids")
  .version("0.1.0");

// Main remap command
program
  .command("remap <table>")
  .description("Remap columns of a table and write the final table")
  .requiredOption("-c, --columns <names...>", "Columns to remap, in splice order")
  .option("-o, --output <path>", "Output directory")
  .option("-n, --name <name>", "Final table name (default: <table>-Map-<abbrev>)")
  .option("--table-name <name>", "Table name used for output names (default: file name)")
  .option("--concurrency <n>", "Maximum tasks running at once")
  .option("--retain-intermediates", "Keep id maps, substituted columns and partial splices")
  .option("--config <path>", "Path to custom config file")
  .option("--dry-run", "Print the task graph without running it")
  .option("-v, --verbose", "Verbose output")
  .action(remapCommand);

// Clean command - delete intermediates of a previous run
program
  .command("clean <table>")
  .description("Delete intermediate files of a previous remap run")
  .requiredOption("-c, --columns <names...>", "Columns of the run to clean")
  .option("-o, --output <path>", "Output directory")
  .option("-n, --name <name>", "Final table name used by the run")
  .option("--table-name <name>", "Table name used for output names")
  .option("--config <path>", "Path to custom config file")
  .action(cleanCommand);

// Config command - show config location
program
  .command("config")
  .description("Show configuration file location")
  .action(configCommand);

program.parse();
