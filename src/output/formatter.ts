import chalk from "chalk";
import { describeTokenZone } from "../budget/tiers.js";
import type { BudgetReport, OmissionReason } from "../budget/types.js";
import type { InputSummary } from "./report-schema.js";

const reasonLabels: Record<OmissionReason, string> = {
  too_small_to_truncate: "remaining quota too small to truncate",
  quota_exhausted: "quota exhausted",
  exceeds_quota: "lower priority than the boundary item",
};

export function formatInputSummary(input: InputSummary): string {
  return chalk.dim(
    `  Input: ${input.items} items in ${input.categories} categories, ${input.tokens} tokens (${input.zone}: ${describeTokenZone(input.zone, input.tokens)})`,
  );
}

/** Format one budgeting pass as a compact table. */
export function formatReport(report: BudgetReport, label: string): string {
  const lines: string[] = [];
  lines.push("");
  lines.push(chalk.bold(`Budget Report: ${label}`) + chalk.dim(` (max ${report.maxTokens} tokens, ${report.estimator})`));
  lines.push("");

  for (const [category, a] of report.perCategory) {
    const status = a.itemCount === 0 ? chalk.red("✗") : a.itemCount < a.candidateCount ? chalk.yellow("~") : chalk.green("✓");
    const usage = `${a.used}/${a.allotted} tokens`;
    const items = `${a.itemCount}/${a.candidateCount} items`;
    const truncated = a.truncatedCount > 0 ? chalk.yellow(`${a.truncatedCount} truncated`) : "";
    lines.push(`  ${status} ${category.padEnd(20)} ${usage.padEnd(20)} ${items.padEnd(14)} ${truncated}`.trimEnd());
  }

  if (report.omitted.length > 0) {
    lines.push("");
    lines.push(chalk.dim("  Omitted:"));
    for (const o of report.omitted) {
      lines.push(`      ${o.id} ${chalk.dim(`(${o.category}, ${o.tokenCost} tokens: ${reasonLabels[o.reason]})`)}`);
    }
  }

  lines.push("");
  const total = `  ${report.totalTokens}/${report.maxTokens} tokens used`;
  lines.push(report.omitted.length === 0 ? chalk.green(total) : chalk.yellow(total));
  lines.push("");

  return lines.join("\n");
}
