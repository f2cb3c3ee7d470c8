import { resolveBudgetConfig } from "./config.js";
import { buildContentItems, measureTokens } from "./items.js";
import { computeQuotas } from "./quota.js";
import { reallocate } from "./reallocator.js";
import { assembleReport } from "./report.js";
import type { BudgetConfigInput, BudgetOptions, BudgetReport, CategorizedContent } from "./types.js";
import { defaultEstimator } from "../utils/tokens.js";

/**
 * Select, order and truncate categorized content so the result fits
 * `config.maxTokens`.
 *
 * Pure and synchronous: inputs are never mutated, diagnostics come back as
 * data in the report. Throws ConfigError / InputError before any selection
 * work, and EstimatorInconsistencyError if the assembled report would
 * exceed the budget.
 *
 * @example
 * ```ts
 * const report = allocateBudget(
 *   new Map([
 *     ["concepts", [{ id: "c1", text: "A pipeline is ...", priority: 0.9 }]],
 *     ["examples", [{ id: "e1", text: "Q: ... A: ...", priority: 0.5 }]],
 *   ]),
 *   { maxTokens: 4500, categoryWeights: { concepts: 3, examples: 1 } },
 * );
 * ```
 */
export function allocateBudget(
  content: CategorizedContent,
  configInput: BudgetConfigInput,
  options: BudgetOptions = {},
): BudgetReport {
  const estimator = options.estimator ?? defaultEstimator;
  const config = resolveBudgetConfig(configInput);
  const itemsByCategory = buildContentItems(content);
  const quotas = computeQuotas([...itemsByCategory.keys()], config);

  const warnings = [...quotas.warnings];
  let inputTokens = 0;
  for (const items of itemsByCategory.values()) {
    for (const item of items) {
      const cost = measureTokens(estimator, item.text);
      inputTokens += cost;
      if (cost > config.maxTokens) {
        warnings.push({
          code: "ITEM_OVER_BUDGET",
          message: `Item "${item.id}" needs ${cost} tokens, more than the whole budget of ${config.maxTokens}; it can never fit whole`,
        });
      }
    }
  }
  if (inputTokens > config.maxTokens) {
    warnings.unshift({
      code: "TOKEN_BUDGET_EXCEEDED",
      message: `Input needs ${inputTokens} tokens but the budget is ${config.maxTokens}; lower-priority content will be truncated or omitted`,
    });
  }

  const { states, rounds, hitRoundLimit } = reallocate(
    itemsByCategory,
    quotas.allotted,
    config,
    estimator,
  );
  if (hitRoundLimit) {
    warnings.push({
      code: "REALLOCATION_ROUND_LIMIT",
      message: `Reallocation stopped at the ${config.maxReallocationRounds}-round limit with unused quota still available`,
    });
  }

  return assembleReport({
    itemsByCategory,
    initialAllotted: quotas.allotted,
    states,
    config,
    estimator,
    rounds,
    warnings,
  });
}

/** Sum of estimated tokens across every item, before any budgeting. */
export function measureContent(
  content: CategorizedContent,
  estimator = defaultEstimator,
): number {
  let total = 0;
  for (const items of content.values()) {
    for (const item of items) total += measureTokens(estimator, item.text);
  }
  return total;
}
