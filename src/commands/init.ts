import readline from "node:readline";
import path from "node:path";
import { ensureGitignore, saveProjectConfig } from "../config/manager.js";
import { DEFAULT_CONFIG, type ConfigFile } from "../config/schema.js";
import { isTierName } from "../budget/tiers.js";
import * as log from "../utils/logger.js";

export interface InitOptions {
  project?: string;
  /** Accept defaults without prompting. */
  yes?: boolean;
}

function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  return new Promise((resolve) => {
    rl.question(question, (answer) => {
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function runInit(opts: InitOptions = {}): Promise<number> {
  const projectDir = path.resolve(opts.project ?? process.cwd());
  log.heading("docpack Setup");

  const config: ConfigFile = {
    tier: DEFAULT_CONFIG.tier,
    estimator: DEFAULT_CONFIG.estimator,
    categoryWeights: DEFAULT_CONFIG.categoryWeights,
    maxReallocationRounds: DEFAULT_CONFIG.maxReallocationRounds,
    minUsefulFragment: DEFAULT_CONFIG.minUsefulFragment,
  };

  if (!opts.yes) {
    const tierInput = await prompt(`Budget tier: standard, comprehensive or full [${DEFAULT_CONFIG.tier}]: `);
    if (tierInput) {
      if (!isTierName(tierInput)) {
        log.error(`Unknown tier "${tierInput}"`);
        return 2;
      }
      config.tier = tierInput;
    }

    const estimatorInput = await prompt(`Token estimator: chars or gpt [${DEFAULT_CONFIG.estimator}]: `);
    if (estimatorInput === "chars" || estimatorInput === "gpt") {
      config.estimator = estimatorInput;
    } else if (estimatorInput) {
      log.error(`Unknown estimator "${estimatorInput}"`);
      return 2;
    }

    const budgetInput = await prompt("Max tokens (blank to use the tier ceiling): ");
    if (budgetInput) {
      const parsed = parseInt(budgetInput, 10);
      if (!isNaN(parsed) && parsed > 0) config.maxTokens = parsed;
    }
  }

  const filePath = saveProjectConfig(projectDir, config);
  log.success(`Project config saved to ${filePath}`);

  if (ensureGitignore(projectDir)) {
    log.info("Added .docpack/ to .gitignore");
  }
  return 0;
}
