import { EstimatorInconsistencyError } from "./errors.js";
import { measureTokens } from "./items.js";
import { resolveBoundary } from "./truncation.js";
import type { CategoryState } from "./reallocator.js";
import type {
  BudgetConfig,
  BudgetReport,
  CategoryAccounting,
  ContentItem,
  BudgetWarning,
  OmittedItem,
  SelectedEntry,
} from "./types.js";
import type { TokenEstimator } from "../utils/tokens.js";

export interface AssembleInput {
  itemsByCategory: ReadonlyMap<string, readonly ContentItem[]>;
  initialAllotted: ReadonlyMap<string, number>;
  states: ReadonlyMap<string, CategoryState>;
  config: BudgetConfig;
  estimator: TokenEstimator;
  rounds: number;
  /** Warnings raised before assembly, kept in front of assembly's own. */
  warnings: readonly BudgetWarning[];
}

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

export function entryText(entry: SelectedEntry): string {
  return entry.kind === "full" ? entry.item.text : entry.item.truncatedText;
}

export function entryId(entry: SelectedEntry): string {
  return entry.kind === "full" ? entry.item.id : entry.item.originalId;
}

/**
 * Resolve boundary items, lay out the selection in category order and
 * account for every category. Totals are re-estimated from the final texts.
 */
export function assembleReport(input: AssembleInput): BudgetReport {
  const { itemsByCategory, initialAllotted, states, config, estimator } = input;
  const selected: SelectedEntry[] = [];
  const omitted: OmittedItem[] = [];
  const perCategory = new Map<string, CategoryAccounting>();
  const warnings = [...input.warnings];
  const truncationNotes: BudgetWarning[] = [];
  const starved: string[] = [];

  for (const [category, items] of itemsByCategory) {
    const state = states.get(category);
    if (!state) continue;
    const { selection } = state;
    const entries: SelectedEntry[] = selection.accepted.map(({ item, tokenCost }): SelectedEntry => ({
      kind: "full",
      category,
      item,
      tokenCost,
    }));

    if (selection.boundary) {
      const outcome = resolveBoundary(
        selection.boundary,
        state.allotted - selection.usedTokens,
        state.allotted,
        config.minUsefulFragment,
        estimator,
      );
      if (outcome.kind === "truncated") {
        entries.push({ kind: "truncated", category, item: outcome.item });
        truncationNotes.push({
          code: "ITEM_TRUNCATED",
          message: `Item "${outcome.item.originalId}" truncated from ${outcome.item.originalTokenCost} to ${outcome.item.truncatedTokenCost} tokens`,
        });
      } else {
        omitted.push(outcome.omission);
      }
    }
    for (const { item, tokenCost } of selection.rejectedAfterBoundary) {
      omitted.push({ id: item.id, category, reason: "exceeds_quota", tokenCost });
    }

    let used = 0;
    for (const entry of entries) used += measureTokens(estimator, entryText(entry));

    const accounting: CategoryAccounting = {
      initialAllotted: initialAllotted.get(category) ?? 0,
      allotted: state.allotted,
      used,
      itemCount: entries.length,
      truncatedCount: entries.filter((e) => e.kind === "truncated").length,
      candidateCount: items.length,
    };
    perCategory.set(category, accounting);
    if (accounting.itemCount === 0 && accounting.candidateCount > 0) starved.push(category);
    selected.push(...entries);
  }

  warnings.push(...truncationNotes);
  if (omitted.length > 0) {
    warnings.push({ code: "ITEMS_OMITTED", message: `${plural(omitted.length, "item")} omitted to fit budget` });
  }
  for (const category of starved) {
    const count = perCategory.get(category)?.candidateCount ?? 0;
    warnings.push({
      code: "CATEGORY_STARVED",
      message: `Category "${category}" fully starved: none of its ${plural(count, "candidate item")} fit`,
    });
  }

  let totalTokens = 0;
  for (const accounting of perCategory.values()) totalTokens += accounting.used;
  if (totalTokens > config.maxTokens) {
    throw new EstimatorInconsistencyError(
      `Assembled report uses ${totalTokens} tokens but the budget is ${config.maxTokens}; estimator "${estimator.name}" is not consistent across calls`,
    );
  }

  return {
    selected,
    perCategory,
    omitted,
    warnings,
    totalTokens,
    maxTokens: config.maxTokens,
    rounds: input.rounds,
    estimator: estimator.name,
  };
}
