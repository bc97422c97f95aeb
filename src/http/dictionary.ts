import { WordCountTrie } from "../core/impl/index.js";

export interface PrefixMatch {
  key: string;
  value: number;
}

export interface KeyPage {
  keys: string[];
  /** Offset of the first key of the next page, null on the last page. */
  nextOffset: number | null;
}

export interface CompleteOptions {
  limit: number;
  offset?: number;
}

/** Word-count dictionary in the shapes the HTTP layer returns. */
export interface Dictionary {
  readonly trie: WordCountTrie;
  size(): number;
  /** Throws `NotFoundError`. */
  lookup(key: string): number;
  /** Returns true when the key was not stored before. */
  put(key: string, value: number): boolean;
  /** Throws `NotFoundError`. */
  remove(key: string): void;
  prefixes(key: string): PrefixMatch[];
  /** Null when no stored key starts with `prefix`. */
  complete(prefix: string, opts: CompleteOptions): KeyPage | null;
  suggest(query: string, distance: number): string[];
  ingest(text: string): void;
}

/**
 * HTTP-friendly cursor encoding.
 *
 * The cursor is the offset of the next key within the prefix listing, wrapped
 * in JSON so it can be extended later without breaking clients.
 */
export function encodeCursor(payload: { offset: number }): string {
  return Buffer.from(JSON.stringify(payload), "utf8").toString("base64");
}

export function decodeCursor(cursor: string): { offset: number } {
  const raw = Buffer.from(cursor, "base64").toString("utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("invalid cursor");
  }
  const offset = typeof parsed === "object" && parsed !== null && "offset" in parsed ? parsed.offset : undefined;
  if (typeof offset !== "number" || !Number.isInteger(offset) || offset < 0) {
    throw new Error("invalid cursor");
  }
  return { offset };
}

export function createDictionary(trie: WordCountTrie = new WordCountTrie()): Dictionary {
  return {
    trie,
    size() {
      return trie.size;
    },
    lookup(key) {
      return trie.get(key);
    },
    put(key, value) {
      const created = !trie.has(key);
      trie.set(key, value);
      return created;
    },
    remove(key) {
      trie.delete(key);
    },
    prefixes(key) {
      return Array.from(trie.iterPrefixes(key), ([k, value]) => ({ key: k, value }));
    },
    complete(prefix, { limit, offset = 0 }) {
      const all = trie.findPrefix(prefix);
      if (!all) return null;
      const end = offset + limit;
      return { keys: all.slice(offset, end), nextOffset: end < all.length ? end : null };
    },
    suggest(query, distance) {
      return Array.from(trie.findWithinDistance(query, distance)).sort();
    },
    ingest(text) {
      trie.addText(text);
    },
  };
}
