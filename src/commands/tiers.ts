import chalk from "chalk";
import { BUDGET_TIERS, TIER_NAMES } from "../budget/tiers.js";

/** Format the budget tiers as a table. */
export function formatTiers(): string {
  const lines: string[] = [""];
  lines.push(chalk.bold("Budget Tiers"));
  lines.push("");
  for (const key of TIER_NAMES) {
    const tier = BUDGET_TIERS[key];
    const range = `${tier.minTokens}-${tier.maxTokens} tokens`;
    lines.push(`  ${key.padEnd(14)} ${range.padEnd(20)} ${tier.fileStrategy}`);
    lines.push(chalk.dim(`  ${"".padEnd(14)} ${tier.useCase}`));
  }
  lines.push("");
  return lines.join("\n");
}

export function runTiers(opts: { format?: "text" | "json" }): number {
  if (opts.format === "json") {
    console.log(JSON.stringify(BUDGET_TIERS, null, 2));
  } else {
    console.log(formatTiers());
  }
  return 0;
}
