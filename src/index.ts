#!/usr/bin/env node

import { Command } from "commander";
import { run } from "./commands/run.js";
import { check } from "./commands/check.js";
import { init } from "./commands/init.js";

const program = new Command();

program
  .name("autofile")
  .description("File documents into folders by the fields encoded in their names")
  .version("0.1.0");

program
  .command("run", { isDefault: true })
  .description("Match source files to target folders and move them after confirmation")
  .option("-c, --config <file>", "Configuration file (default: autofile.yml)")
  .option("-y, --yes", "Transfer without asking for confirmation")
  .option("-n, --dry-run", "Report matches only, move nothing")
  .option("-o, --output <file>", "Save the match plan (.csv, .xlsx, .json)")
  .option("-l, --log <file>", "Run log, JSON lines (default: autofile.log.jsonl)")
  .action(async (options: { config?: string; yes?: boolean; dryRun?: boolean; output?: string; log?: string }) => {
    await run(options);
  });

program
  .command("check")
  .description("Validate the configuration and list the target folders")
  .option("-c, --config <file>", "Configuration file (default: autofile.yml)")
  .action(async (options: { config?: string }) => {
    await check(options);
  });

program
  .command("init")
  .description("Write a sample configuration file")
  .option("-c, --config <file>", "Where to write it (default: autofile.yml)")
  .option("-f, --force", "Overwrite an existing file")
  .action(async (options: { config?: string; force?: boolean }) => {
    await init(options);
  });

await program.parseAsync();
