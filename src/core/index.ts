export type { Entry, Token, Word } from "./types.js";
export type { KeyCodec } from "./keyCodec.js";
export type { PrefixTrie } from "./trie.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export { SNAPSHOT_VERSION, type NodeSnapshot, type TrieSnapshot } from "./snapshot.js";
export { TrieError, NotFoundError, InvalidArgumentError, isTrieError, type TrieErrorCode } from "./errors.js";
export * from "./impl/index.js";
