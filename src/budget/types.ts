import type { TokenEstimator } from "../utils/tokens.js";

/** One candidate chunk: a concept definition, a page summary, an example. */
export interface ContentItem {
  readonly id: string;
  readonly text: string;
  /** In [0, 1]; higher is more important. Ties keep input order. */
  readonly priority: number;
  readonly category: string;
}

/** Raw `(id, text, priority)` tuple as handed over by the extraction stage. */
export interface RawContentItem {
  id: string;
  text: string;
  priority: number;
}

/** Category name → items, in declaration order. */
export type CategorizedContent = ReadonlyMap<string, readonly RawContentItem[]>;

/** Shortened prefix of an item that did not fit whole. Never re-selected. */
export interface TruncatedItem {
  readonly originalId: string;
  readonly truncatedText: string;
  readonly truncatedTokenCost: number;
  readonly originalTokenCost: number;
}

export type SelectedEntry =
  | { readonly kind: "full"; readonly category: string; readonly item: ContentItem; readonly tokenCost: number }
  | { readonly kind: "truncated"; readonly category: string; readonly item: TruncatedItem };

export type OmissionReason = "too_small_to_truncate" | "quota_exhausted" | "exceeds_quota";

export interface OmittedItem {
  readonly id: string;
  readonly category: string;
  readonly reason: OmissionReason;
  readonly tokenCost: number;
}

export interface CategoryAccounting {
  /** Quota from the initial proportional split. */
  initialAllotted: number;
  /** Quota after reallocation. */
  allotted: number;
  used: number;
  itemCount: number;
  truncatedCount: number;
  candidateCount: number;
}

/** Stable identifiers for report warnings, for consumers of the JSON output. */
export type WarningCode =
  | "FLOORS_SCALED"
  | "TOKEN_BUDGET_EXCEEDED"
  | "ITEM_OVER_BUDGET"
  | "REALLOCATION_ROUND_LIMIT"
  | "ITEM_TRUNCATED"
  | "ITEMS_OMITTED"
  | "CATEGORY_STARVED";

export interface BudgetWarning {
  readonly code: WarningCode;
  readonly message: string;
}

export interface BudgetReport {
  readonly selected: readonly SelectedEntry[];
  readonly perCategory: ReadonlyMap<string, CategoryAccounting>;
  readonly omitted: readonly OmittedItem[];
  readonly warnings: readonly BudgetWarning[];
  readonly totalTokens: number;
  readonly maxTokens: number;
  /** Reallocation rounds that ran. */
  readonly rounds: number;
  readonly estimator: string;
}

/** Caller-facing configuration; unset fields take documented defaults. */
export interface BudgetConfigInput {
  maxTokens: number;
  categoryWeights?: Readonly<Record<string, number>>;
  minCategoryFloor?: Readonly<Record<string, number>>;
  maxReallocationRounds?: number;
  minUsefulFragment?: number;
}

/** Fully specified configuration the engine runs on. */
export interface BudgetConfig {
  readonly maxTokens: number;
  readonly categoryWeights: Readonly<Record<string, number>>;
  readonly minCategoryFloor: Readonly<Record<string, number>>;
  readonly maxReallocationRounds: number;
  readonly minUsefulFragment: number;
}

export interface BudgetOptions {
  estimator?: TokenEstimator;
}
