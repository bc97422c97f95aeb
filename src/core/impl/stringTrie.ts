import type { Entry } from "../types.js";
import { findWithinDistance } from "./edits.js";
import { stringKeys } from "./keyCodecs.js";
import { MemoryTrie } from "./memoryTrie.js";

/** Trie over plain string keys, one symbol per character. */
export class StringTrie<V> extends MemoryTrie<string, string, V> {
  constructor(entries?: Iterable<Entry<string, V>>) {
    super(stringKeys, entries);
  }

  /** Stored keys exactly `distance` edits away from `word` (see `editsN`). */
  findWithinDistance(word: string, distance = 2): Set<string> {
    return findWithinDistance(this, word, distance);
  }
}
