import { readFile, rename, writeFile } from "node:fs/promises";

import { parseSnapshot, stringifySnapshot, type Schema } from "../core/impl/jsonSnapshot.js";
import type { MemoryTrie } from "../core/impl/memoryTrie.js";
import { createLogger } from "../logger.js";

const log = createLogger("snapshot-file");

/** Writes the trie as JSON. The file is replaced in one rename. */
export async function saveTrie<K, S, V>(trie: MemoryTrie<K, S, V>, path: string): Promise<void> {
  const tmp = `${path}.tmp`;
  await writeFile(tmp, stringifySnapshot(trie.snapshot()), "utf8");
  await rename(tmp, path);
  log.info({ path, keys: trie.size }, "snapshot saved");
}

/**
 * Restores `trie` from a file written by `saveTrie`. File system errors
 * propagate unchanged; malformed content raises `InvalidArgumentError`.
 */
export async function loadTrie<T extends MemoryTrie<unknown, S, V>, S, V>(
  trie: T,
  path: string,
  schemas: { symbol: Schema<S>; value: Schema<V> },
): Promise<T> {
  const json = await readFile(path, "utf8");
  trie.restore(parseSnapshot(json, schemas.symbol, schemas.value));
  log.info({ path, keys: trie.size }, "snapshot loaded");
  return trie;
}
