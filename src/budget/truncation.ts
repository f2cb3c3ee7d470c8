import { measureTokens } from "./items.js";
import type { CostedItem } from "./selector.js";
import type { OmittedItem, TruncatedItem } from "./types.js";
import type { TokenEstimator } from "../utils/tokens.js";

export type TruncationOutcome =
  | { kind: "truncated"; item: TruncatedItem }
  | { kind: "omitted"; omission: OmittedItem };

/** Step back over a trailing high surrogate so a pair is never split. */
function safeCut(text: string, cut: number): number {
  if (cut > 0 && cut < text.length) {
    const code = text.charCodeAt(cut - 1);
    if (code >= 0xd800 && code <= 0xdbff) return cut - 1;
  }
  return cut;
}

/**
 * Longest leading prefix of `text` whose estimate is <= `quota`, excluding
 * the full text. The search starts from the cut the token ratio suggests
 * and narrows by re-estimating.
 */
export function truncateToFit(
  text: string,
  originalTokenCost: number,
  quota: number,
  estimator: TokenEstimator,
): string {
  const fits = (length: number): boolean =>
    measureTokens(estimator, text.slice(0, length)) <= quota;

  // lo always fits (empty prefix), hi is the longest length still in play
  let lo = 0;
  let hi = text.length - 1;

  if (originalTokenCost > 0) {
    const guess = Math.min(hi, Math.floor((text.length * quota) / originalTokenCost));
    if (guess > 0) {
      if (fits(guess)) lo = guess;
      else hi = guess - 1;
    }
  }

  while (lo < hi) {
    const mid = Math.ceil((lo + hi) / 2);
    if (fits(mid)) lo = mid;
    else hi = mid - 1;
  }

  return text.slice(0, safeCut(text, lo));
}

/**
 * Decide what happens to a category's boundary item given the quota left
 * after its accepted items. Only an item that would fit the category's whole
 * final `allotted` on its own is a truncation candidate.
 */
export function resolveBoundary(
  boundary: CostedItem,
  remainingQuota: number,
  allotted: number,
  minUsefulFragment: number,
  estimator: TokenEstimator,
): TruncationOutcome {
  const { item, tokenCost } = boundary;
  const omit = (reason: OmittedItem["reason"]): TruncationOutcome => ({
    kind: "omitted",
    omission: { id: item.id, category: item.category, reason, tokenCost },
  });

  if (tokenCost > allotted) return omit("quota_exhausted");
  if (remainingQuota < minUsefulFragment) return omit("too_small_to_truncate");

  const truncatedText = truncateToFit(item.text, tokenCost, remainingQuota, estimator);
  if (truncatedText.length === 0) return omit("quota_exhausted");

  return {
    kind: "truncated",
    item: Object.freeze({
      originalId: item.id,
      truncatedText,
      truncatedTokenCost: measureTokens(estimator, truncatedText),
      originalTokenCost: tokenCost,
    }),
  };
}
