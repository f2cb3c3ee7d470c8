import { describe, it, expect } from "vitest";
import { reallocate } from "../src/budget/reallocator.js";
import { computeQuotas } from "../src/budget/quota.js";
import { resolveBudgetConfig } from "../src/budget/config.js";
import { buildContentItems } from "../src/budget/items.js";
import { defaultEstimator } from "../src/utils/tokens.js";
import type { BudgetConfigInput, CategorizedContent } from "../src/budget/types.js";
import { content } from "./helpers.js";

function run(input: CategorizedContent, configInput: BudgetConfigInput) {
  const config = resolveBudgetConfig(configInput);
  const items = buildContentItems(input);
  const { allotted } = computeQuotas([...items.keys()], config);
  const result = reallocate(items, allotted, config, defaultEstimator);
  const summary = Object.fromEntries(
    [...result.states].map(([category, s]) => [category, { allotted: s.allotted, used: s.selection.usedTokens }]),
  );
  const totalAllotted = [...result.states.values()].reduce((sum, s) => sum + s.allotted, 0);
  return { ...result, summary, totalAllotted };
}

describe("reallocate", () => {
  it("moves surplus from a satisfied category to a deficit one", () => {
    const result = run(
      content({
        concepts: [["c1", 50, 0.9], ["c2", 40, 0.8], ["c3", 30, 0.7]],
        examples: [["e1", 10, 0.5]],
      }),
      { maxTokens: 100, categoryWeights: { concepts: 3, examples: 1 } },
    );
    expect(result.summary).toEqual({
      concepts: { allotted: 90, used: 90 },
      examples: { allotted: 10, used: 10 },
    });
    expect(result.rounds).toBe(1);
    expect(result.hitRoundLimit).toBe(false);
    expect(result.states.get("concepts")?.selection.boundary?.item.id).toBe("c3");
  });

  it("stops at a fixed point when extra quota gains nothing", () => {
    const result = run(
      content({ concepts: [["big", 200, 0.9]], examples: [["e1", 10, 0.5]] }),
      { maxTokens: 100, categoryWeights: { concepts: 3, examples: 1 } },
    );
    expect(result.rounds).toBe(1);
    expect(result.summary).toEqual({
      concepts: { allotted: 90, used: 0 },
      examples: { allotted: 10, used: 10 },
    });
  });

  it("iterates while newly satisfied categories free more quota", () => {
    const result = run(
      content({
        a: [["a1", 10, 0.5]],
        b: [["b1", 25, 0.9], ["b2", 20, 0.5]],
        c: [["c1", 35, 0.5]],
      }),
      { maxTokens: 90 },
    );
    expect(result.rounds).toBe(2);
    expect(result.summary).toEqual({
      a: { allotted: 10, used: 10 },
      b: { allotted: 45, used: 45 },
      c: { allotted: 35, used: 35 },
    });
  });

  it("splits evenly between deficit categories that all weigh zero", () => {
    const result = run(
      content({ a: [["a1", 30, 0.5]], b: [["b1", 5, 0.5]] }),
      { maxTokens: 50, categoryWeights: { a: 0, b: 1 }, minCategoryFloor: { a: 10 } },
    );
    expect(result.summary).toEqual({
      a: { allotted: 45, used: 30 },
      b: { allotted: 5, used: 5 },
    });
  });

  it("does nothing when rounds are capped at zero", () => {
    const result = run(
      content({ concepts: [["c1", 50, 0.9], ["c2", 40, 0.8]], examples: [["e1", 10, 0.5]] }),
      { maxTokens: 100, categoryWeights: { concepts: 3, examples: 1 }, maxReallocationRounds: 0 },
    );
    expect(result.rounds).toBe(0);
    expect(result.hitRoundLimit).toBe(true);
    expect(result.summary).toEqual({
      concepts: { allotted: 75, used: 50 },
      examples: { allotted: 25, used: 10 },
    });
  });

  it("never allots more than the budget", () => {
    const result = run(
      content({
        a: [["a1", 3, 0.5], ["a2", 70, 0.4]],
        b: [["b1", 12, 0.9], ["b2", 8, 0.1]],
        c: [["c1", 1, 0.5]],
      }),
      { maxTokens: 77, categoryWeights: { a: 2, b: 1, c: 5 } },
    );
    expect(result.totalAllotted).toBeLessThanOrEqual(77);
  });
});
