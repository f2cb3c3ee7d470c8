/**
 * MCP tool definitions. Handlers are plain async functions so they can be
 * exercised without a transport; bin/docpack-mcp.ts registers them.
 */

import { z } from "zod";
import { allocateBudget, measureContent } from "../budget/engine.js";
import { BudgetError } from "../budget/errors.js";
import { BUDGET_TIERS, TIER_NAMES } from "../budget/tiers.js";
import { DEFAULT_CONFIG, toBudgetConfigInput, type DocpackConfig } from "../config/schema.js";
import { rawItemSchema, toCategorizedContent } from "../input/loader.js";
import { buildJsonReport, summarizeInput } from "../output/report-schema.js";
import { getEstimator } from "../utils/tokens.js";

export type ToolResult = {
  content: { type: "text"; text: string }[];
  isError?: boolean;
};

function textResult(text: string): ToolResult {
  return { content: [{ type: "text", text }] };
}

function errorResult(err: unknown): ToolResult {
  const msg = err instanceof Error ? err.message : String(err);
  const hint = err instanceof BudgetError ? `\nHint: ${err.hint}` : "";
  return { content: [{ type: "text", text: `Error: ${msg}${hint}` }], isError: true };
}

// --- budget_content ---

export const budgetContentShape = {
  content: z
    .record(z.string().min(1), z.array(rawItemSchema))
    .describe("Category name → items ({ id, text, priority in [0,1] }). Key order is output order."),
  tier: z.enum(TIER_NAMES).optional().describe("Budget tier (default: standard)"),
  maxTokens: z.number().int().optional().describe("Explicit token ceiling; overrides tier"),
  categoryWeights: z.record(z.string(), z.number()).optional()
    .describe("Relative weight per category (missing categories weigh 1.0)"),
  minCategoryFloor: z.record(z.string(), z.number()).optional()
    .describe("Minimum tokens reserved per category"),
  maxReallocationRounds: z.number().int().optional(),
  minUsefulFragment: z.number().int().optional()
    .describe("Smallest truncated fragment worth keeping, in tokens (default 20)"),
  estimator: z.enum(["chars", "gpt"]).optional().describe("Token estimator (default: chars)"),
};

export type BudgetContentArgs = z.infer<z.ZodObject<typeof budgetContentShape>>;

export async function budgetContent(args: BudgetContentArgs): Promise<ToolResult> {
  try {
    const config: DocpackConfig = {
      ...DEFAULT_CONFIG,
      tier: args.tier ?? DEFAULT_CONFIG.tier,
      maxTokens: args.maxTokens,
      estimator: args.estimator ?? DEFAULT_CONFIG.estimator,
      categoryWeights: args.categoryWeights ?? DEFAULT_CONFIG.categoryWeights,
      minCategoryFloor: args.minCategoryFloor ?? DEFAULT_CONFIG.minCategoryFloor,
      maxReallocationRounds: args.maxReallocationRounds ?? DEFAULT_CONFIG.maxReallocationRounds,
      minUsefulFragment: args.minUsefulFragment ?? DEFAULT_CONFIG.minUsefulFragment,
    };
    const estimator = getEstimator(config.estimator);
    const content = toCategorizedContent(args.content);

    const report = allocateBudget(content, toBudgetConfigInput(config), { estimator });
    const label = args.maxTokens !== undefined ? "custom" : config.tier;
    const json = buildJsonReport(
      summarizeInput(content, measureContent(content, estimator)),
      [{ label, report }],
    );
    return textResult(JSON.stringify(json, null, 2));
  } catch (err: unknown) {
    return errorResult(err);
  }
}

// --- list_budget_tiers ---

export async function listBudgetTiers(): Promise<ToolResult> {
  const lines = ["## Budget Tiers", ""];
  for (const key of TIER_NAMES) {
    const t = BUDGET_TIERS[key];
    lines.push(`- **${key}**: ${t.minTokens}-${t.maxTokens} tokens, ${t.fileStrategy}. ${t.useCase}`);
  }
  return textResult(lines.join("\n"));
}
