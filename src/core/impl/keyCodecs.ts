import type { KeyCodec } from "../keyCodec.js";

/** String keys, one symbol per code point. */
export const stringKeys: KeyCodec<string, string> = {
  toSymbols: (key) => Array.from(key),
  fromSymbols: (symbols) => symbols.join(""),
};

/** Sequence keys such as token lists; every element is one symbol. */
export function sequenceKeys<S>(): KeyCodec<readonly S[], S> {
  return {
    toSymbols: (key) => key,
    fromSymbols: (symbols) => symbols.slice(),
  };
}
