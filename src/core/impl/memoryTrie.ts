import { InvalidArgumentError, NotFoundError } from "../errors.js";
import type { KeyCodec } from "../keyCodec.js";
import { SNAPSHOT_VERSION, type NodeSnapshot, type TrieSnapshot } from "../snapshot.js";
import type { PrefixTrie } from "../trie.js";
import type { Entry } from "../types.js";
import { TrieNode } from "./trieNode.js";

export class MemoryTrie<K, S, V> implements PrefixTrie<K, V> {
  private root = new TrieNode<S, V>();

  constructor(
    protected readonly codec: KeyCodec<K, S>,
    entries?: Iterable<Entry<K, V>>,
  ) {
    if (entries) this.update(entries);
  }

  get size(): number {
    return this.root.count;
  }

  set(key: K, value: V): this {
    let node = this.root;
    for (const symbol of this.codec.toSymbols(key)) {
      node = node.childOrCreate(symbol);
    }
    node.attachValue(value);
    return this;
  }

  update(entries: Iterable<Entry<K, V>>): this {
    for (const [key, value] of entries) this.set(key, value);
    return this;
  }

  get(key: K): V {
    const payload = this.findNode(this.codec.toSymbols(key))?.payload;
    if (!payload) throw new NotFoundError(`key not found: ${describeKey(key)}`);
    return payload.value;
  }

  find(key: K): V | undefined {
    return this.findNode(this.codec.toSymbols(key))?.payload?.value;
  }

  has(key: K): boolean {
    return this.findNode(this.codec.toSymbols(key))?.terminal ?? false;
  }

  /**
   * Clears the key's value, then prunes the terminal node and every ancestor
   * left without children or value. The root always stays.
   */
  delete(key: K): void {
    const trail: Array<[parent: TrieNode<S, V>, symbol: S]> = [];
    let node = this.root;
    for (const symbol of this.codec.toSymbols(key)) {
      const next = node.childFor(symbol);
      if (!next) throw new NotFoundError(`key not found: ${describeKey(key)}`);
      trail.push([node, symbol]);
      node = next;
    }
    if (!node.clearValue()) throw new NotFoundError(`key not found: ${describeKey(key)}`);

    let child = node;
    for (const [parent, symbol] of trail.reverse()) {
      if (!child.isEmpty()) break;
      parent.children.delete(symbol);
      child = parent;
    }
  }

  clear(): void {
    this.root.reset();
  }

  *iterPrefixes(key: K): Generator<Entry<K, V>> {
    const path: S[] = [];
    let node = this.root;
    if (node.payload) yield [this.codec.fromSymbols(path), node.payload.value];

    for (const symbol of this.codec.toSymbols(key)) {
      const next = node.childFor(symbol);
      if (!next) return;
      path.push(symbol);
      node = next;
      if (node.payload) yield [this.codec.fromSymbols(path), node.payload.value];
    }
  }

  findPrefix(prefix: K): K[] | undefined {
    const symbols = this.codec.toSymbols(prefix);
    const node = this.findNode(symbols);
    if (!node) return undefined;
    return Array.from(this.walk(node, symbols.slice()), ([key]) => key);
  }

  *keys(): Generator<K> {
    for (const [key] of this.walk(this.root, [])) yield key;
  }

  *values(): Generator<V> {
    for (const [, value] of this.walk(this.root, [])) yield value;
  }

  entries(): Generator<Entry<K, V>> {
    return this.walk(this.root, []);
  }

  [Symbol.iterator](): Iterator<K> {
    return this.keys();
  }

  snapshot(): TrieSnapshot<S, V> {
    return { version: SNAPSHOT_VERSION, root: encodeNode(this.root) };
  }

  /**
   * Replaces the whole content with `snapshot`. Stored counts are checked
   * against the rebuilt structure; on mismatch nothing is replaced.
   */
  restore(snapshot: TrieSnapshot<S, V>): this {
    const root = new TrieNode<S, V>();
    decodeInto(root, snapshot.root, []);
    this.root = root;
    return this;
  }

  private findNode(symbols: Iterable<S>): TrieNode<S, V> | undefined {
    let node: TrieNode<S, V> | undefined = this.root;
    for (const symbol of symbols) {
      node = node.childFor(symbol);
      if (!node) return undefined;
    }
    return node;
  }

  /**
   * Pre-order: a node's own entry first, then its children in insertion order.
   * `path` is pushed and popped in place and belongs to this traversal only.
   */
  private *walk(node: TrieNode<S, V>, path: S[]): Generator<Entry<K, V>> {
    if (node.payload) yield [this.codec.fromSymbols(path), node.payload.value];
    for (const [symbol, child] of node.children) {
      path.push(symbol);
      yield* this.walk(child, path);
      path.pop();
    }
  }
}

function encodeNode<S, V>(node: TrieNode<S, V>): NodeSnapshot<S, V> {
  const out: NodeSnapshot<S, V> = {
    count: node.count,
    children: Array.from(node.children, ([symbol, child]): [S, NodeSnapshot<S, V>] => [symbol, encodeNode(child)]),
  };
  if (node.payload) out.payload = { value: node.payload.value };
  return out;
}

function decodeInto<S, V>(node: TrieNode<S, V>, snap: NodeSnapshot<S, V>, path: S[]): void {
  if (snap.payload) node.attachValue(snap.payload.value);
  for (const [symbol, childSnap] of snap.children) {
    if (node.children.has(symbol)) {
      throw new InvalidArgumentError(`duplicate child ${String(symbol)} at /${path.join("/")}`);
    }
    path.push(symbol);
    decodeInto(node.childOrCreate(symbol), childSnap, path);
    path.pop();
  }

  if (node.parent && node.isEmpty()) {
    throw new InvalidArgumentError(`empty node at /${path.join("/")}`);
  }
  if (node.count !== snap.count) {
    throw new InvalidArgumentError(`count mismatch at /${path.join("/")}: stored ${snap.count}, actual ${node.count}`);
  }
}

function describeKey(key: unknown): string {
  return typeof key === "string" ? JSON.stringify(key) : String(key);
}
