/**
 * Versioned JSON output for docpack runs.
 *
 * BudgetReport holds Maps and a tagged union; this module flattens it into
 * plain JSON for CI consumers, the MCP server and downstream renderers.
 */

import { entryId, entryText } from "../budget/report.js";
import { classifyTokenZone, type TokenZone } from "../budget/tiers.js";
import type { BudgetReport, CategorizedContent, OmissionReason, WarningCode } from "../budget/types.js";

// --- Schema Types ---

export interface DocpackJsonReport {
  schemaVersion: "1.0";
  generatedAt: string;
  input: InputSummary;
  passes: BudgetPass[];
}

export interface InputSummary {
  categories: number;
  items: number;
  tokens: number;
  zone: TokenZone;
}

export interface BudgetPass {
  /** Tier name, or "custom" for an explicit max token count. */
  label: string;
  report: SerializedReport;
}

export interface SerializedReport {
  maxTokens: number;
  totalTokens: number;
  rounds: number;
  estimator: string;
  perCategory: CategorySummary[];
  selected: SelectedSummary[];
  omitted: { id: string; category: string; reason: OmissionReason; tokens: number }[];
  warnings: { code: WarningCode; message: string }[];
}

export interface CategorySummary {
  category: string;
  initialAllotted: number;
  allotted: number;
  used: number;
  itemCount: number;
  truncatedCount: number;
  candidateCount: number;
}

export interface SelectedSummary {
  id: string;
  category: string;
  truncated: boolean;
  tokens: number;
  originalTokens: number;
  text: string;
}

// --- Builders ---

export function serializeReport(report: BudgetReport): SerializedReport {
  return {
    maxTokens: report.maxTokens,
    totalTokens: report.totalTokens,
    rounds: report.rounds,
    estimator: report.estimator,
    perCategory: [...report.perCategory].map(([category, a]) => ({ category, ...a })),
    selected: report.selected.map((entry) => ({
      id: entryId(entry),
      category: entry.category,
      truncated: entry.kind === "truncated",
      tokens: entry.kind === "full" ? entry.tokenCost : entry.item.truncatedTokenCost,
      originalTokens: entry.kind === "full" ? entry.tokenCost : entry.item.originalTokenCost,
      text: entryText(entry),
    })),
    omitted: report.omitted.map((o) => ({
      id: o.id,
      category: o.category,
      reason: o.reason,
      tokens: o.tokenCost,
    })),
    warnings: report.warnings.map((w) => ({ code: w.code, message: w.message })),
  };
}

export function summarizeInput(content: CategorizedContent, tokens: number): InputSummary {
  let categories = 0;
  let items = 0;
  for (const list of content.values()) {
    if (list.length > 0) categories++;
    items += list.length;
  }
  return { categories, items, tokens, zone: classifyTokenZone(tokens) };
}

export function buildJsonReport(
  input: InputSummary,
  passes: { label: string; report: BudgetReport }[],
): DocpackJsonReport {
  return {
    schemaVersion: "1.0",
    generatedAt: new Date().toISOString(),
    input,
    passes: passes.map(({ label, report }) => ({ label, report: serializeReport(report) })),
  };
}
