/** Shared core types used by module contracts. */

export type Word = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Word;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** Optional character offsets for highlighting. */
  startOffset?: number;
  endOffset?: number;
}

/** A stored key together with its value, as yielded by traversals. */
export type Entry<K, V> = [key: K, value: V];
