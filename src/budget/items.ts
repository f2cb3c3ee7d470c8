import { EstimatorInconsistencyError, InputError } from "./errors.js";
import type { CategorizedContent, ContentItem } from "./types.js";
import type { TokenEstimator } from "../utils/tokens.js";

/**
 * Turn the extraction stage's raw tuples into validated ContentItems,
 * grouped by category in declaration order. Categories without items are
 * dropped.
 */
export function buildContentItems(content: CategorizedContent): Map<string, ContentItem[]> {
  const seen = new Set<string>();
  const result = new Map<string, ContentItem[]>();

  for (const [category, rawItems] of content) {
    if (category.trim().length === 0) {
      throw new InputError("Category names must be non-empty");
    }
    if (rawItems.length === 0) continue;

    const items: ContentItem[] = [];
    for (const raw of rawItems) {
      if (raw.id.length === 0) {
        throw new InputError(`Item in category "${category}" has an empty id`);
      }
      if (seen.has(raw.id)) {
        throw new InputError(`Duplicate item id "${raw.id}" in category "${category}"`);
      }
      if (raw.text.length === 0) {
        throw new InputError(`Item "${raw.id}" has empty text`);
      }
      if (!Number.isFinite(raw.priority) || raw.priority < 0 || raw.priority > 1) {
        throw new InputError(`Item "${raw.id}" priority must be within [0, 1], got ${raw.priority}`);
      }
      seen.add(raw.id);
      items.push(Object.freeze({ id: raw.id, text: raw.text, priority: raw.priority, category }));
    }
    result.set(category, items);
  }

  return result;
}

/** Estimate through `estimator`, rejecting counts no valid estimator can produce. */
export function measureTokens(estimator: TokenEstimator, text: string): number {
  const tokens = estimator.estimate(text);
  if (!Number.isInteger(tokens) || tokens < 0) {
    throw new EstimatorInconsistencyError(
      `Estimator "${estimator.name}" returned ${tokens} for a ${text.length}-character text`,
    );
  }
  return tokens;
}
