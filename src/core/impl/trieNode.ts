/**
 * A single trie vertex. `payload` is absent when the path is only a prefix.
 *
 * `count` is the number of value-bearing nodes in this subtree, self included.
 * It only changes when a node gains or loses its value, and the delta is pushed
 * up through `parent` in the same step. `parent` is a back-reference for that
 * propagation only; children are owned through `children`.
 */
export class TrieNode<S, V> {
  payload: { value: V } | undefined = undefined;
  count = 0;
  readonly children = new Map<S, TrieNode<S, V>>();

  constructor(readonly parent: TrieNode<S, V> | null = null) {}

  get terminal(): boolean {
    return this.payload !== undefined;
  }

  /** Returns true when the node did not hold a value before. */
  attachValue(value: V): boolean {
    const added = !this.payload;
    this.payload = { value };
    if (added) this.propagate(1);
    return added;
  }

  /** Returns true when a value was removed. */
  clearValue(): boolean {
    if (!this.payload) return false;
    this.payload = undefined;
    this.propagate(-1);
    return true;
  }

  childFor(symbol: S): TrieNode<S, V> | undefined {
    return this.children.get(symbol);
  }

  childOrCreate(symbol: S): TrieNode<S, V> {
    let child = this.children.get(symbol);
    if (!child) {
      child = new TrieNode<S, V>(this);
      this.children.set(symbol, child);
    }
    return child;
  }

  isEmpty(): boolean {
    return !this.terminal && this.children.size === 0;
  }

  /** Drops the whole subtree and this node's own value. */
  reset(): void {
    const removed = this.count;
    this.children.clear();
    this.payload = undefined;
    this.propagate(-removed);
  }

  private propagate(delta: number): void {
    if (delta === 0) return;
    for (let node: TrieNode<S, V> | null = this; node; node = node.parent) {
      node.count += delta;
    }
  }
}
