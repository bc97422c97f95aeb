export { TrieNode } from "./trieNode.js";
export { MemoryTrie } from "./memoryTrie.js";
export { StringTrie } from "./stringTrie.js";
export { WordCountTrie, type WordCountOptions } from "./wordCountTrie.js";
export { stringKeys, sequenceKeys } from "./keyCodecs.js";
export { LOWERCASE_ALPHABET, edits1, editsN, findWithinDistance } from "./edits.js";
export { WordTokenizer, countWords } from "./wordTokenizer.js";
export { parseSnapshot, stringifySnapshot, type Schema } from "./jsonSnapshot.js";
