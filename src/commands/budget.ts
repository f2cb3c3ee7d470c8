import fs from "node:fs";
import path from "node:path";
import { allocateBudget, measureContent } from "../budget/engine.js";
import { BudgetError, ConfigError, getExitCode } from "../budget/errors.js";
import { budgetAllTiers, isTierName } from "../budget/tiers.js";
import type { BudgetReport } from "../budget/types.js";
import { loadConfig } from "../config/manager.js";
import { toBudgetConfigInput, type DocpackConfig } from "../config/schema.js";
import { loadContent } from "../input/loader.js";
import { formatInputSummary, formatReport } from "../output/formatter.js";
import { buildJsonReport, summarizeInput } from "../output/report-schema.js";
import { getEstimator } from "../utils/tokens.js";
import * as log from "../utils/logger.js";

export interface BudgetCommandOptions {
  input?: string;
  stdin?: boolean;
  project?: string;
  maxTokens?: string;
  tier?: string;
  allTiers?: boolean;
  estimator?: string;
  format?: "text" | "json";
  output?: string;
}

/** Layer CLI flags over the loaded config. */
function applyFlags(config: DocpackConfig, opts: BudgetCommandOptions): DocpackConfig {
  const result = { ...config };
  if (opts.tier !== undefined) {
    if (!isTierName(opts.tier)) {
      throw new ConfigError(`Unknown tier "${opts.tier}" (expected standard, comprehensive or full)`);
    }
    result.tier = opts.tier;
    result.maxTokens = undefined;
  }
  if (opts.maxTokens !== undefined) {
    if (opts.allTiers) {
      throw new ConfigError("--max-tokens cannot be combined with --all-tiers, which uses each tier's own ceiling");
    }
    result.maxTokens = Number(opts.maxTokens);
  }
  if (opts.estimator !== undefined) {
    if (opts.estimator !== "chars" && opts.estimator !== "gpt") {
      throw new ConfigError(`Unknown estimator "${opts.estimator}" (expected chars or gpt)`);
    }
    result.estimator = opts.estimator;
  }
  return result;
}

/**
 * Run docpack budget: standalone CLI entry point.
 * Returns 0 on success, or the exit code for the error that stopped the run.
 */
export async function runBudget(
  opts: BudgetCommandOptions,
  stdin: NodeJS.ReadableStream = process.stdin,
): Promise<number> {
  const projectDir = path.resolve(opts.project ?? ".");
  if (!fs.existsSync(projectDir)) {
    log.error(`project directory not found: ${projectDir}`);
    return 1;
  }

  try {
    const config = applyFlags(loadConfig(projectDir), opts);
    const estimator = getEstimator(config.estimator);
    const content = await loadContent({ input: opts.input, stdin: opts.stdin }, stdin);

    const budgetConfig = toBudgetConfigInput(config);
    const passes: { label: string; report: BudgetReport }[] = [];
    if (opts.allTiers) {
      for (const [tier, report] of budgetAllTiers(content, budgetConfig, { estimator })) {
        passes.push({ label: tier, report });
      }
    } else {
      const label = config.maxTokens !== undefined ? "custom" : config.tier;
      passes.push({ label, report: allocateBudget(content, budgetConfig, { estimator }) });
    }

    const input = summarizeInput(content, measureContent(content, estimator));
    const jsonReport = buildJsonReport(input, passes);

    if (opts.format === "json") {
      console.log(JSON.stringify(jsonReport, null, 2));
    } else {
      console.log(formatInputSummary(input));
      for (const { label, report } of passes) {
        console.log(formatReport(report, label));
        log.warnings(report.warnings);
      }
    }

    if (opts.output) {
      const outPath = path.resolve(opts.output);
      fs.writeFileSync(outPath, JSON.stringify(jsonReport, null, 2) + "\n", "utf-8");
      if (opts.format !== "json") log.success(`Report written to ${outPath}`);
    }
    return 0;
  } catch (err: unknown) {
    if (err instanceof BudgetError) {
      log.error(err.message, err.hint);
    } else {
      log.error(err instanceof Error ? err.message : String(err));
    }
    return getExitCode(err);
  }
}
