import type { Entry } from "./types.js";

/**
 * Map over symbol-sequence keys with prefix queries.
 *
 * Contract notes:
 * - a key whose path exists only as a prefix of other keys is absent for
 *   `get`/`has`/`delete`, but present for `findPrefix`
 * - traversal order is depth-first pre-order, children in insertion order
 * - not safe for concurrent mutation; each traversal owns its own path buffer
 */
export interface PrefixTrie<K, V> extends Iterable<K> {
  readonly size: number;

  set(key: K, value: V): this;
  /** Throws `NotFoundError` when `key` holds no value. */
  get(key: K): V;
  find(key: K): V | undefined;
  has(key: K): boolean;
  /** Throws `NotFoundError` when `key` holds no value. */
  delete(key: K): void;
  clear(): void;

  /**
   * Stored keys that are prefixes of `key` (including `key`), shortest first.
   * A value under the empty key is yielded first.
   */
  iterPrefixes(key: K): Generator<Entry<K, V>>;
  /** Keys under the node for `prefix`, or undefined when that node does not exist. */
  findPrefix(prefix: K): K[] | undefined;

  keys(): Generator<K>;
  values(): Generator<V>;
  entries(): Generator<Entry<K, V>>;
}
