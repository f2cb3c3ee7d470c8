#!/usr/bin/env node

import { Command, Option } from "commander";
import { runBudget, type BudgetCommandOptions } from "../src/commands/budget.js";
import { runTiers } from "../src/commands/tiers.js";
import { runInit, type InitOptions } from "../src/commands/init.js";
import { getExitCode } from "../src/budget/errors.js";
import * as log from "../src/utils/logger.js";

const program = new Command();

const formatOption = () =>
  new Option("--format <format>", "Output format").choices(["text", "json"]).default("text");

program
  .name("docpack")
  .description("Fit llms.txt documentation content into a token budget")
  .version("0.1.0");

program
  .command("budget")
  .description("Select, order and truncate content items to fit a token budget")
  .option("--input <file>", "Path to content JSON file")
  .option("--stdin", "Read content JSON from stdin")
  .option("--project <dir>", "Project directory holding .docpack/config.json (default: cwd)")
  .option("--max-tokens <n>", "Token ceiling (overrides the tier)")
  .addOption(new Option("--tier <tier>", "Budget tier").choices(["standard", "comprehensive", "full"]))
  .option("--all-tiers", "Run one independent pass per tier (cannot be combined with --max-tokens)")
  .addOption(new Option("--estimator <name>", "Token estimator").choices(["chars", "gpt"]))
  .addOption(formatOption())
  .option("--output <file>", "Also write the JSON report to a file")
  .action(async (opts: BudgetCommandOptions) => {
    const code = await runBudget(opts);
    process.exit(code);
  });

program
  .command("tiers")
  .description("List the budget tiers")
  .addOption(formatOption())
  .action((opts: { format?: "text" | "json" }) => {
    process.exit(runTiers(opts));
  });

program
  .command("init")
  .description("Write a project config to .docpack/config.json")
  .option("--project <dir>", "Project directory (default: cwd)")
  .option("-y, --yes", "Accept defaults without prompting")
  .action(async (opts: InitOptions) => {
    try {
      process.exit(await runInit(opts));
    } catch (err: unknown) {
      log.error(err instanceof Error ? err.message : String(err));
      process.exit(getExitCode(err));
    }
  });

program.parse();
