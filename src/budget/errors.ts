/**
 * Error taxonomy for the budgeting engine and the surfaces around it.
 *
 * Only invalid configuration/input and a broken estimator are errors.
 * Truncation, omission and starvation are reported through BudgetReport.
 */

export const ERROR_HINTS = {
  CONFIG_INVALID: "Fix the budget configuration (max tokens, weights, floors) and run again",
  INPUT_INVALID: "Check the content items: ids must be unique, text non-empty, priority within [0, 1]",
  ESTIMATOR_INCONSISTENT: "The token estimator is not deterministic or not monotonic; use another estimator",
} as const;

export type BudgetErrorCode = keyof typeof ERROR_HINTS;

export class BudgetError extends Error {
  readonly code: BudgetErrorCode;
  readonly hint: string;

  constructor(code: BudgetErrorCode, message: string) {
    super(message);
    this.name = "BudgetError";
    this.code = code;
    this.hint = ERROR_HINTS[code];
  }
}

/** Raised before any selection work when the configuration cannot be satisfied. */
export class ConfigError extends BudgetError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

/** Raised when content items (or the file holding them) are malformed. */
export class InputError extends BudgetError {
  constructor(message: string) {
    super("INPUT_INVALID", message);
    this.name = "InputError";
  }
}

/**
 * The assembled report exceeds its budget even though selection ran
 * correctly, or the estimator produced an impossible count.
 */
export class EstimatorInconsistencyError extends BudgetError {
  constructor(message: string) {
    super("ESTIMATOR_INCONSISTENT", message);
    this.name = "EstimatorInconsistencyError";
  }
}

/** Map an error to a CLI exit code. */
export function getExitCode(err: unknown): number {
  if (!(err instanceof BudgetError)) return 1;
  switch (err.code) {
    case "CONFIG_INVALID":
    case "INPUT_INVALID":
      return 2;
    case "ESTIMATOR_INCONSISTENT":
      return 3;
  }
}
