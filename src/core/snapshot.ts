/**
 * Plain-data image of a trie's node tree.
 *
 * Children are listed in traversal order. Parent links are not stored; they are
 * implied by nesting and rebuilt on restore. `count` is stored so a reader can
 * check it against the structure.
 */
export interface NodeSnapshot<S, V> {
  payload?: { value: V };
  count: number;
  children: Array<[S, NodeSnapshot<S, V>]>;
}

export const SNAPSHOT_VERSION = 1;

export interface TrieSnapshot<S, V> {
  version: typeof SNAPSHOT_VERSION;
  root: NodeSnapshot<S, V>;
}
