import { measureTokens } from "./items.js";
import type { ContentItem } from "./types.js";
import type { TokenEstimator } from "../utils/tokens.js";

export interface CostedItem {
  item: ContentItem;
  tokenCost: number;
}

export interface SelectionResult {
  accepted: CostedItem[];
  /** First item in priority order that did not fit; the only truncation candidate. */
  boundary?: CostedItem;
  rejectedAfterBoundary: CostedItem[];
  usedTokens: number;
  remainingQuota: number;
}

/** Priority descending, ties by input order. */
export function sortByPriority(items: readonly ContentItem[]): ContentItem[] {
  return items
    .map((item, index) => ({ item, index }))
    .sort((a, b) => b.item.priority - a.item.priority || a.index - b.index)
    .map(({ item }) => item);
}

/**
 * Greedy single pass over one category. Nothing after the boundary is
 * revisited in the same pass, even if it would fit.
 */
export function selectByPriority(
  items: readonly ContentItem[],
  quota: number,
  estimator: TokenEstimator,
): SelectionResult {
  const accepted: CostedItem[] = [];
  const rejectedAfterBoundary: CostedItem[] = [];
  let boundary: CostedItem | undefined;
  let remaining = quota;

  for (const item of sortByPriority(items)) {
    const tokenCost = measureTokens(estimator, item.text);
    if (boundary) {
      rejectedAfterBoundary.push({ item, tokenCost });
    } else if (tokenCost <= remaining) {
      accepted.push({ item, tokenCost });
      remaining -= tokenCost;
    } else {
      boundary = { item, tokenCost };
    }
  }

  return {
    accepted,
    boundary,
    rejectedAfterBoundary,
    usedTokens: quota - remaining,
    remainingQuota: remaining,
  };
}
