export { allocateBudget, measureContent } from "./budget/engine.js";
export {
  resolveBudgetConfig,
  DEFAULT_MAX_REALLOCATION_ROUNDS,
  DEFAULT_MIN_USEFUL_FRAGMENT,
} from "./budget/config.js";
export {
  BudgetError,
  ConfigError,
  InputError,
  EstimatorInconsistencyError,
  getExitCode,
} from "./budget/errors.js";
export {
  BUDGET_TIERS,
  TIER_NAMES,
  budgetAllTiers,
  classifyTokenZone,
  type BudgetTier,
  type TierName,
  type TokenZone,
} from "./budget/tiers.js";
export { entryId, entryText } from "./budget/report.js";
export type {
  BudgetConfig,
  BudgetConfigInput,
  BudgetOptions,
  BudgetReport,
  BudgetWarning,
  CategorizedContent,
  CategoryAccounting,
  ContentItem,
  OmissionReason,
  OmittedItem,
  RawContentItem,
  SelectedEntry,
  TruncatedItem,
  WarningCode,
} from "./budget/types.js";
export {
  createCharRatioEstimator,
  createGptTokenizerEstimator,
  defaultEstimator,
  DEFAULT_CHARS_PER_TOKEN,
  type TokenEstimator,
} from "./utils/tokens.js";
