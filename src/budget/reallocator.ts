import { splitProportionally } from "./quota.js";
import { weightOf } from "./config.js";
import { selectByPriority, type SelectionResult } from "./selector.js";
import type { BudgetConfig, ContentItem } from "./types.js";
import type { TokenEstimator } from "../utils/tokens.js";

export interface CategoryState {
  allotted: number;
  selection: SelectionResult;
}

export interface ReallocationResult {
  states: Map<string, CategoryState>;
  rounds: number;
  /** True when the round cap stopped iteration with demand still unmet. */
  hitRoundLimit: boolean;
}

/**
 * Move unused quota from categories that cannot use it (no boundary item)
 * to categories that can, re-running selection from scratch for the
 * receivers. Fixed-point iteration bounded by `maxReallocationRounds`;
 * it makes no attempt at a globally optimal packing.
 */
export function reallocate(
  itemsByCategory: ReadonlyMap<string, readonly ContentItem[]>,
  initialAllotted: ReadonlyMap<string, number>,
  config: BudgetConfig,
  estimator: TokenEstimator,
): ReallocationResult {
  const states = new Map<string, CategoryState>();
  for (const [category, items] of itemsByCategory) {
    const allotted = initialAllotted.get(category) ?? 0;
    states.set(category, { allotted, selection: selectByPriority(items, allotted, estimator) });
  }

  let rounds = 0;
  while (rounds < config.maxReallocationRounds) {
    const deficit = [...states.entries()].filter(([, s]) => s.selection.boundary !== undefined);
    if (deficit.length === 0) return { states, rounds, hitRoundLimit: false };

    let pool = 0;
    for (const state of states.values()) {
      if (state.selection.boundary === undefined && state.selection.remainingQuota > 0) {
        pool += state.selection.remainingQuota;
      }
    }
    if (pool === 0) return { states, rounds, hitRoundLimit: false };

    for (const state of states.values()) {
      if (state.selection.boundary === undefined) {
        state.allotted = state.selection.usedTokens;
        state.selection = { ...state.selection, remainingQuota: 0 };
      }
    }

    let weights = new Map(deficit.map(([category]) => [category, weightOf(config, category)]));
    if ([...weights.values()].every((w) => w === 0)) {
      weights = new Map(deficit.map(([category]) => [category, 1]));
    }
    const grants = splitProportionally(pool, weights);

    rounds++;
    let gained = 0;
    for (const [category, state] of deficit) {
      const before = state.selection.usedTokens;
      state.allotted += grants.get(category) ?? 0;
      state.selection = selectByPriority(itemsByCategory.get(category) ?? [], state.allotted, estimator);
      gained += state.selection.usedTokens - before;
    }

    if (gained === 0) return { states, rounds, hitRoundLimit: false };
  }

  const unmet = [...states.values()].some((s) => s.selection.boundary !== undefined);
  let pool = 0;
  for (const s of states.values()) {
    if (s.selection.boundary === undefined) pool += s.selection.remainingQuota;
  }
  return { states, rounds, hitRoundLimit: unmet && pool > 0 };
}
