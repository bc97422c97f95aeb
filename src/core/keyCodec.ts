/**
 * Converts between an external key and the symbol path used to descend the trie.
 *
 * Contract notes:
 * - `fromSymbols(toSymbols(k))` must equal `k`
 * - `fromSymbols` must not keep a reference to the array it is given; traversals
 *   reuse that buffer after the call returns
 */
export interface KeyCodec<K, S> {
  toSymbols(key: K): readonly S[];
  fromSymbols(symbols: readonly S[]): K;
}
