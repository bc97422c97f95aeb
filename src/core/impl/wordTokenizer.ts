import type { Token, Word } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

/** Maximal runs of letters, digits and underscore, in any script. */
const WORD_RE = /[\p{L}\p{N}_]+/gu;

/**
 * Word tokenizer:
 * - splits on anything that is not a letter, digit or underscore
 * - lowercases unless `normalizeCase` is false
 * - yields token positions (token index) and character offsets
 */
export class WordTokenizer implements Tokenizer {
  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;

    let position = 0;
    for (const match of text.matchAll(WORD_RE)) {
      const start = match.index ?? 0;
      const raw = match[0];
      yield {
        term: normalizeCase ? raw.toLowerCase() : raw,
        position: position++,
        startOffset: start,
        endOffset: start + raw.length,
      };
    }
  }
}

/** Occurrences per term, in order of first occurrence. */
export function countWords(tokens: Iterable<Token>): Map<Word, number> {
  const counts = new Map<Word, number>();
  for (const tok of tokens) counts.set(tok.term, (counts.get(tok.term) ?? 0) + 1);
  return counts;
}
