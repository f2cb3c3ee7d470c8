import { ConfigError } from "./errors.js";
import { floorOf, weightOf } from "./config.js";
import type { BudgetConfig, BudgetWarning } from "./types.js";

export interface QuotaResult {
  /** Category → allotted tokens, in category order. */
  allotted: Map<string, number>;
  warnings: BudgetWarning[];
}

/**
 * Hand `remainder` leftover tokens out one at a time to the heaviest
 * categories first (ties: declaration order), cycling until none are left.
 * Zero-weight categories receive nothing.
 */
export function distributeRemainder(
  allotted: Map<string, number>,
  weights: ReadonlyMap<string, number>,
  remainder: number,
): void {
  const order = [...weights.entries()]
    .map(([category, weight], index) => ({ category, weight, index }))
    .filter((c) => c.weight > 0)
    .sort((a, b) => b.weight - a.weight || a.index - b.index);

  if (order.length === 0) return;

  for (let i = 0; i < remainder; i++) {
    const { category } = order[i % order.length];
    allotted.set(category, (allotted.get(category) ?? 0) + 1);
  }
}

/**
 * Split `pool` tokens across `weights` proportionally, rounding down and
 * giving the rounding remainder to the heaviest categories.
 */
export function splitProportionally(
  pool: number,
  weights: ReadonlyMap<string, number>,
): Map<string, number> {
  const shares = new Map<string, number>();
  let totalWeight = 0;
  for (const weight of weights.values()) totalWeight += weight;

  if (totalWeight === 0) {
    for (const category of weights.keys()) shares.set(category, 0);
    return shares;
  }

  let distributed = 0;
  for (const [category, weight] of weights) {
    const share = Math.floor((pool * weight) / totalWeight);
    shares.set(category, share);
    distributed += share;
  }

  distributeRemainder(shares, weights, pool - distributed);
  return shares;
}

/**
 * Initial per-category allotment: floors first (scaled down if they alone
 * exceed the budget), then the rest by weight.
 */
export function computeQuotas(
  categories: readonly string[],
  config: BudgetConfig,
): QuotaResult {
  const warnings: BudgetWarning[] = [];
  const allotted = new Map<string, number>();
  if (categories.length === 0) return { allotted, warnings };

  const weights = new Map(categories.map((c) => [c, weightOf(config, c)]));
  let totalWeight = 0;
  for (const w of weights.values()) totalWeight += w;
  if (totalWeight === 0) {
    throw new ConfigError(
      `Every category with content has weight 0 (${categories.join(", ")}); at least one weight must be > 0`,
    );
  }

  const requestedFloors = new Map(categories.map((c) => [c, floorOf(config, c)]));
  let floorSum = 0;
  for (const f of requestedFloors.values()) floorSum += f;

  const floors = new Map<string, number>();
  if (floorSum > config.maxTokens) {
    for (const [category, floor] of requestedFloors) {
      floors.set(category, Math.floor((floor * config.maxTokens) / floorSum));
    }
    warnings.push({
      code: "FLOORS_SCALED",
      message: `Category floors request ${floorSum} tokens but the budget is ${config.maxTokens}; floors were scaled down proportionally`,
    });
  } else {
    for (const [category, floor] of requestedFloors) floors.set(category, floor);
  }

  let floorTotal = 0;
  for (const f of floors.values()) floorTotal += f;

  const shares = splitProportionally(config.maxTokens - floorTotal, weights);
  for (const category of categories) {
    allotted.set(category, (floors.get(category) ?? 0) + (shares.get(category) ?? 0));
  }

  return { allotted, warnings };
}
