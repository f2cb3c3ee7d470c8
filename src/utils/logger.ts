import chalk from "chalk";
import type { BudgetWarning } from "../budget/types.js";

export function info(msg: string): void {
  console.log(chalk.blue("ℹ"), msg);
}

export function success(msg: string): void {
  console.log(chalk.green("✔"), msg);
}

export function warn(msg: string): void {
  console.log(chalk.yellow("⚠"), msg);
}

/** Errors go to stderr so JSON on stdout stays parseable. */
export function error(msg: string, hint?: string): void {
  console.error(chalk.red("✖"), msg);
  if (hint) console.error(chalk.dim(`  hint: ${hint}`));
}

export function heading(msg: string): void {
  console.log(chalk.bold.cyan(`\n${msg}`));
  console.log(chalk.dim("─".repeat(Math.min(msg.length + 4, 60))));
}

/** Engine warnings, printed after a budgeting pass returns. */
export function warnings(list: readonly BudgetWarning[]): void {
  for (const w of list) warn(`${w.message} ${chalk.dim(`[${w.code}]`)}`);
}
