import { InvalidArgumentError } from "../errors.js";
import type { PrefixTrie } from "../trie.js";

export const LOWERCASE_ALPHABET = "abcdefghijklmnopqrstuvwxyz";

/**
 * Every string one edit away from `word`: delete one character, swap two
 * adjacent characters, replace one character, or insert one. Characters are
 * code points, as in `stringKeys`.
 * Replacing a character with itself is included, so `word` is in the result.
 */
export function edits1(word: string, alphabet: string = LOWERCASE_ALPHABET): Set<string> {
  if (typeof word !== "string") {
    throw new InvalidArgumentError(`word must be a string, got ${typeof word}`);
  }

  const chars = Array.from(word);
  const letters = Array.from(alphabet);
  const out = new Set<string>();
  for (let i = 0; i <= chars.length; i++) {
    const left = chars.slice(0, i).join("");
    const rest = chars.slice(i);

    const right = rest.join("");
    for (const c of letters) out.add(left + c + right);

    const [head, next] = rest;
    if (head === undefined) continue;
    const tail = chars.slice(i + 1).join("");

    out.add(left + tail);
    for (const c of letters) out.add(left + c + tail);
    if (next !== undefined) out.add(left + next + head + chars.slice(i + 2).join(""));
  }
  return out;
}

/**
 * Strings reachable from `word` by applying `edits1` exactly `distance` times.
 * The frontier is deduplicated at every step, which yields the same set as
 * expanding every edit path and deduplicating once at the end.
 */
export function editsN(word: string, distance: number, alphabet: string = LOWERCASE_ALPHABET): Set<string> {
  if (!Number.isInteger(distance) || distance <= 0) {
    throw new InvalidArgumentError(`distance must be a positive integer, got ${distance}`);
  }

  let frontier = edits1(word, alphabet);
  for (let step = 1; step < distance; step++) {
    const next = new Set<string>();
    for (const w of frontier) {
      for (const e of edits1(w, alphabet)) next.add(e);
    }
    frontier = next;
  }
  return frontier;
}

/**
 * Stored keys among the `distance`-edit candidates of `word`.
 * Cost follows the size of the candidate set, not the trie.
 */
export function findWithinDistance<V>(
  trie: PrefixTrie<string, V>,
  word: string,
  distance = 2,
  alphabet: string = LOWERCASE_ALPHABET,
): Set<string> {
  const found = new Set<string>();
  for (const candidate of editsN(word, distance, alphabet)) {
    if (trie.has(candidate)) found.add(candidate);
  }
  return found;
}
