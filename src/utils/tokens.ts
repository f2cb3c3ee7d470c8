import { encode } from "gpt-tokenizer";

/**
 * Maps text to an estimated token count.
 *
 * Implementations must be deterministic and monotonic: appending characters
 * never lowers the estimate.
 */
export interface TokenEstimator {
  /** Short identifier shown in reports ("chars/4", "gpt-tokenizer"). */
  readonly name: string;
  estimate(text: string): number;
}

/** Characters per token assumed by the default estimator. */
export const DEFAULT_CHARS_PER_TOKEN = 4;

/**
 * Character-ratio approximation: `ceil(length / charsPerToken)`.
 * Non-empty text always estimates to at least 1 token.
 */
export function createCharRatioEstimator(
  charsPerToken: number = DEFAULT_CHARS_PER_TOKEN,
): TokenEstimator {
  if (!Number.isFinite(charsPerToken) || charsPerToken <= 0) {
    throw new RangeError(`charsPerToken must be a positive number, got ${charsPerToken}`);
  }
  return {
    name: `chars/${charsPerToken}`,
    estimate: (text) => Math.ceil(text.length / charsPerToken),
  };
}

/**
 * Exact BPE counts via gpt-tokenizer. Claude's tokenizer differs by roughly
 * 10-15%, which is close enough for budget enforcement.
 */
export function createGptTokenizerEstimator(): TokenEstimator {
  return {
    name: "gpt-tokenizer",
    estimate: (text) => encode(text).length,
  };
}

export const defaultEstimator: TokenEstimator = createCharRatioEstimator();

export type EstimatorName = "chars" | "gpt";

export function getEstimator(name: EstimatorName): TokenEstimator {
  return name === "gpt" ? createGptTokenizerEstimator() : defaultEstimator;
}
