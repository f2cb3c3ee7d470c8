import { describe, it, expect } from "vitest";
import { resolveBoundary, truncateToFit } from "../src/budget/truncation.js";
import { createCharRatioEstimator, defaultEstimator } from "../src/utils/tokens.js";
import type { ContentItem } from "../src/budget/types.js";
import { tokens } from "./helpers.js";

function boundary(id: string, text: string) {
  const item: ContentItem = { id, text, priority: 0.1, category: "concepts" };
  return { item, tokenCost: defaultEstimator.estimate(text) };
}

describe("truncateToFit", () => {
  it("keeps the longest prefix that fits the quota", () => {
    const text = tokens(40);
    expect(truncateToFit(text, 40, 20, defaultEstimator)).toBe(text.slice(0, 80));
  });

  it("returns a leading prefix of the original text", () => {
    const text = "abcdefghij".repeat(20);
    expect(truncateToFit(text, 50, 21, defaultEstimator)).toBe(text.slice(0, 84));
  });

  it("corrects a proportional guess that undershoots", () => {
    // "W" costs 10 tokens, everything else 1
    const skewed = {
      name: "skewed",
      estimate: (t: string) => t.length + (t.match(/W/g)?.length ?? 0) * 9,
    };
    const text = "a".repeat(10) + "W".repeat(10);
    expect(truncateToFit(text, skewed.estimate(text), 15, skewed)).toBe("a".repeat(10));
  });

  it("never splits a surrogate pair", () => {
    const perChar = createCharRatioEstimator(1);
    const text = "a" + "😀".repeat(5);
    expect(truncateToFit(text, text.length, 4, perChar)).toBe("a😀");
  });

  it("re-estimates within the quota it was cut to", () => {
    const text = "The quick brown fox jumps over the lazy dog. ".repeat(12);
    const cost = defaultEstimator.estimate(text);
    for (const quota of [1, 7, 20, 33, cost - 1]) {
      const cut = truncateToFit(text, cost, quota, defaultEstimator);
      expect(defaultEstimator.estimate(cut)).toBeLessThanOrEqual(quota);
      expect(text.startsWith(cut)).toBe(true);
    }
  });
});

describe("resolveBoundary", () => {
  it("truncates when the remaining quota reaches the minimum fragment size", () => {
    const outcome = resolveBoundary(boundary("c3", tokens(40)), 20, 100, 20, defaultEstimator);
    expect(outcome).toEqual({
      kind: "truncated",
      item: {
        originalId: "c3",
        truncatedText: tokens(20),
        truncatedTokenCost: 20,
        originalTokenCost: 40,
      },
    });
  });

  it("omits when the remaining quota is below the minimum fragment size", () => {
    const outcome = resolveBoundary(boundary("c3", tokens(40)), 19, 100, 20, defaultEstimator);
    expect(outcome).toEqual({
      kind: "omitted",
      omission: { id: "c3", category: "concepts", reason: "too_small_to_truncate", tokenCost: 40 },
    });
  });

  it("omits as quota_exhausted when not even one unit fits", () => {
    const outcome = resolveBoundary(boundary("c3", tokens(40)), 0, 80, 0, defaultEstimator);
    expect(outcome).toEqual({
      kind: "omitted",
      omission: { id: "c3", category: "concepts", reason: "quota_exhausted", tokenCost: 40 },
    });
  });

  it("omits an item that would not fit the category's whole allotment", () => {
    const outcome = resolveBoundary(boundary("p1", tokens(500)), 100, 100, 20, defaultEstimator);
    expect(outcome).toEqual({
      kind: "omitted",
      omission: { id: "p1", category: "concepts", reason: "quota_exhausted", tokenCost: 500 },
    });
  });

  it("still truncates an item that exactly matches the allotment", () => {
    const outcome = resolveBoundary(boundary("c1", tokens(40)), 30, 40, 20, defaultEstimator);
    expect(outcome.kind).toBe("truncated");
  });

  it("appends no marker to the truncated text", () => {
    const text = "Alpha beta gamma delta epsilon zeta eta theta iota kappa lambda mu nu xi omicron pi rho sigma tau.";
    const outcome = resolveBoundary(boundary("g", text), 20, 100, 20, defaultEstimator);
    expect(outcome.kind).toBe("truncated");
    if (outcome.kind === "truncated") {
      expect(outcome.item.truncatedText).toBe(text.slice(0, 80));
    }
  });
});
