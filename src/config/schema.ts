import { z } from "zod";
import { TIER_NAMES, BUDGET_TIERS, type TierName } from "../budget/tiers.js";
import type { BudgetConfigInput } from "../budget/types.js";
import type { EstimatorName } from "../utils/tokens.js";

export interface DocpackConfig {
  tier: TierName;
  /** Overrides the tier's ceiling when set. */
  maxTokens?: number;
  estimator: EstimatorName;
  categoryWeights: Record<string, number>;
  minCategoryFloor: Record<string, number>;
  maxReallocationRounds: number;
  minUsefulFragment: number;
}

export const DEFAULT_CONFIG: DocpackConfig = {
  tier: "standard",
  estimator: "chars",
  categoryWeights: { concepts: 3, pages: 2, examples: 1 },
  minCategoryFloor: {},
  maxReallocationRounds: 5,
  minUsefulFragment: 20,
};

/** Shape of a config file on disk; every field optional. */
export const configFileSchema = z
  .object({
    tier: z.enum(TIER_NAMES),
    maxTokens: z.number().int().positive(),
    estimator: z.enum(["chars", "gpt"]),
    categoryWeights: z.record(z.string().min(1), z.number().nonnegative()),
    minCategoryFloor: z.record(z.string().min(1), z.number().int().nonnegative()),
    maxReallocationRounds: z.number().int().nonnegative(),
    minUsefulFragment: z.number().int().nonnegative(),
  })
  .partial()
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export const GLOBAL_CONFIG_DIR = ".docpack";
export const GLOBAL_CONFIG_FILE = "config.json";
export const PROJECT_CONFIG_DIR = ".docpack";
export const PROJECT_CONFIG_FILE = "config.json";

/** Engine configuration for a loaded config; `maxTokens` wins over `tier`. */
export function toBudgetConfigInput(config: DocpackConfig): BudgetConfigInput {
  return {
    maxTokens: config.maxTokens ?? BUDGET_TIERS[config.tier].maxTokens,
    categoryWeights: config.categoryWeights,
    minCategoryFloor: config.minCategoryFloor,
    maxReallocationRounds: config.maxReallocationRounds,
    minUsefulFragment: config.minUsefulFragment,
  };
}
