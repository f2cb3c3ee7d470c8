import { ConfigError } from "./errors.js";
import type { BudgetConfig, BudgetConfigInput } from "./types.js";

export const DEFAULT_MAX_REALLOCATION_ROUNDS = 5;
/** Below this many tokens a truncated fragment is not worth keeping. */
export const DEFAULT_MIN_USEFUL_FRAGMENT = 20;
export const DEFAULT_CATEGORY_WEIGHT = 1;

function assertNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${field} must be a non-negative integer, got ${value}`);
  }
}

function assertNonNegativeMap(
  map: Readonly<Record<string, number>>,
  field: string,
): void {
  for (const [category, value] of Object.entries(map)) {
    if (!Number.isFinite(value) || value < 0) {
      throw new ConfigError(`${field}["${category}"] must be a finite number >= 0, got ${value}`);
    }
  }
}

/** Apply defaults once and validate; the engine never sees a partial config. */
export function resolveBudgetConfig(input: BudgetConfigInput): BudgetConfig {
  if (!Number.isInteger(input.maxTokens) || input.maxTokens <= 0) {
    throw new ConfigError(`maxTokens must be a positive integer, got ${input.maxTokens}`);
  }

  const categoryWeights = { ...(input.categoryWeights ?? {}) };
  const minCategoryFloor = { ...(input.minCategoryFloor ?? {}) };
  const maxReallocationRounds = input.maxReallocationRounds ?? DEFAULT_MAX_REALLOCATION_ROUNDS;
  const minUsefulFragment = input.minUsefulFragment ?? DEFAULT_MIN_USEFUL_FRAGMENT;

  assertNonNegativeMap(categoryWeights, "categoryWeights");
  assertNonNegativeMap(minCategoryFloor, "minCategoryFloor");
  assertNonNegativeInteger(maxReallocationRounds, "maxReallocationRounds");
  assertNonNegativeInteger(minUsefulFragment, "minUsefulFragment");

  return {
    maxTokens: input.maxTokens,
    categoryWeights,
    minCategoryFloor,
    maxReallocationRounds,
    minUsefulFragment,
  };
}

export function weightOf(config: BudgetConfig, category: string): number {
  return config.categoryWeights[category] ?? DEFAULT_CATEGORY_WEIGHT;
}

/** Floors are whole tokens; fractional floors round down. */
export function floorOf(config: BudgetConfig, category: string): number {
  return Math.floor(config.minCategoryFloor[category] ?? 0);
}
