import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import {
  type ConfigFile,
  type DocpackConfig,
  configFileSchema,
  DEFAULT_CONFIG,
  GLOBAL_CONFIG_DIR,
  GLOBAL_CONFIG_FILE,
  PROJECT_CONFIG_DIR,
  PROJECT_CONFIG_FILE,
} from "./schema.js";
import { ConfigError } from "../budget/errors.js";

export function getGlobalConfigPath(homeDir: string = os.homedir()): string {
  return path.join(homeDir, GLOBAL_CONFIG_DIR, GLOBAL_CONFIG_FILE);
}

export function getProjectConfigPath(projectDir: string): string {
  return path.join(projectDir, PROJECT_CONFIG_DIR, PROJECT_CONFIG_FILE);
}

/** Read and validate a config file. Missing file → empty config. */
export function readConfigFile(filePath: string): ConfigFile {
  if (!fs.existsSync(filePath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Invalid JSON in ${filePath}: ${msg}`);
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config in ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/** Layer `override` on `base`; weight and floor maps merge per category. */
export function mergeConfig(base: DocpackConfig, override: ConfigFile): DocpackConfig {
  return {
    ...base,
    ...override,
    categoryWeights: { ...base.categoryWeights, ...override.categoryWeights },
    minCategoryFloor: { ...base.minCategoryFloor, ...override.minCategoryFloor },
  };
}

/** Load merged config: defaults < global < project. */
export function loadConfig(
  projectDir: string,
  homeDir: string = os.homedir(),
): DocpackConfig {
  const globalCfg = readConfigFile(getGlobalConfigPath(homeDir));
  const projectCfg = readConfigFile(getProjectConfigPath(projectDir));
  return mergeConfig(mergeConfig(DEFAULT_CONFIG, globalCfg), projectCfg);
}

/** Write config to the project config file, merged with what is already there. */
export function saveProjectConfig(projectDir: string, config: ConfigFile): string {
  const filePath = getProjectConfigPath(projectDir);
  fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const existing = readConfigFile(filePath);
  const merged = { ...existing, ...config };
  fs.writeFileSync(filePath, JSON.stringify(merged, null, 2) + "\n", "utf-8");
  return filePath;
}

/**
 * Ensure .docpack/ is in the project's .gitignore. Returns true when the
 * entry was added.
 */
export function ensureGitignore(projectDir: string): boolean {
  const gitignorePath = path.join(projectDir, ".gitignore");
  const entry = `${PROJECT_CONFIG_DIR}/`;

  // No .gitignore: leave the project alone
  if (!fs.existsSync(gitignorePath)) return false;

  const content = fs.readFileSync(gitignorePath, "utf-8");
  if (content.split("\n").some((line) => line.trim() === entry)) return false;
  fs.appendFileSync(gitignorePath, `\n${entry}\n`, "utf-8");
  return true;
}
