import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, lowercase every token. */
  normalizeCase?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - should be deterministic for given input+options
 * - should avoid allocations where possible (iterators/generators ok)
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
