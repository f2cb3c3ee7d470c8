import type { CategorizedContent, RawContentItem } from "../src/budget/types.js";

/** Text costing exactly `n` tokens under the default chars/4 estimator. */
export function tokens(n: number, ch = "x"): string {
  return ch.repeat(n * 4);
}

export function content(
  categories: Record<string, [id: string, cost: number, priority: number][]>,
): CategorizedContent {
  const map = new Map<string, RawContentItem[]>();
  for (const [category, items] of Object.entries(categories)) {
    map.set(
      category,
      items.map(([id, cost, priority]) => ({ id, text: tokens(cost), priority })),
    );
  }
  return map;
}
