import { allocateBudget } from "./engine.js";
import type { BudgetConfigInput, BudgetOptions, BudgetReport, CategorizedContent } from "./types.js";

export interface BudgetTier {
  name: string;
  minTokens: number;
  maxTokens: number;
  useCase: string;
  fileStrategy: string;
}

export const TIER_NAMES = ["standard", "comprehensive", "full"] as const;
export type TierName = (typeof TIER_NAMES)[number];

export const BUDGET_TIERS: Readonly<Record<TierName, BudgetTier>> = {
  standard: {
    name: "Standard",
    minTokens: 1_500,
    maxTokens: 4_500,
    useCase: "Small projects, <100 pages, <5 features",
    fileStrategy: "single",
  },
  comprehensive: {
    name: "Comprehensive",
    minTokens: 4_500,
    maxTokens: 12_000,
    useCase: "Medium projects, 100-500 pages, 5-20 features",
    fileStrategy: "dual (index + full)",
  },
  full: {
    name: "Full",
    minTokens: 12_000,
    maxTokens: 50_000,
    useCase: "Large projects, 500+ pages, 20+ features",
    fileStrategy: "multi (master + per-service)",
  },
};

export function isTierName(value: string): value is TierName {
  return (TIER_NAMES as readonly string[]).includes(value);
}

// Zone thresholds for a whole document; above each one decomposition
// becomes more pressing.
export const TOKEN_ZONE_OPTIMAL = 20_000;
export const TOKEN_ZONE_GOOD = 50_000;
export const TOKEN_ZONE_DEGRADATION = 100_000;
export const TOKEN_ZONE_ANTI_PATTERN = 500_000;

export type TokenZone = "optimal" | "good" | "degradation" | "anti-pattern";

export function classifyTokenZone(tokens: number): TokenZone {
  if (tokens <= TOKEN_ZONE_OPTIMAL) return "optimal";
  if (tokens <= TOKEN_ZONE_GOOD) return "good";
  if (tokens <= TOKEN_ZONE_DEGRADATION) return "degradation";
  return "anti-pattern";
}

export function describeTokenZone(zone: TokenZone, tokens: number): string {
  switch (zone) {
    case "optimal":
      return "no decomposition needed";
    case "good":
      return "consider a dual-file strategy";
    case "degradation":
      return "tiering strongly recommended";
    case "anti-pattern":
      return tokens > TOKEN_ZONE_ANTI_PATTERN
        ? "exceeds every current context window"
        : "monolithic; split into per-service files";
  }
}

/**
 * One independent pass per tier. Passes share nothing, so each report
 * is exactly what a single-tier run would produce.
 */
export function budgetAllTiers(
  content: CategorizedContent,
  config: Omit<BudgetConfigInput, "maxTokens">,
  options: BudgetOptions = {},
): Map<TierName, BudgetReport> {
  const reports = new Map<TierName, BudgetReport>();
  for (const tier of TIER_NAMES) {
    reports.set(tier, allocateBudget(content, { ...config, maxTokens: BUDGET_TIERS[tier].maxTokens }, options));
  }
  return reports;
}
