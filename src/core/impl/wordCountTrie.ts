import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";
import { StringTrie } from "./stringTrie.js";
import { WordTokenizer, countWords } from "./wordTokenizer.js";

export interface WordCountOptions {
  /** Lowercase words before counting. Default true. */
  lowercase?: boolean;
  tokenizer?: Tokenizer;
}

/** Maps every word of a corpus to its number of occurrences. */
export class WordCountTrie extends StringTrie<number> {
  private readonly tokenizer: Tokenizer;
  private readonly tokenizeOptions: TokenizeOptions;

  constructor(options: WordCountOptions = {}) {
    super();
    this.tokenizer = options.tokenizer ?? new WordTokenizer();
    this.tokenizeOptions = { normalizeCase: options.lowercase ?? true };
  }

  static fromText(text: string, options?: WordCountOptions): WordCountTrie {
    return new WordCountTrie(options).addText(text);
  }

  /** Adds the counts of `text` onto the stored ones. */
  addText(text: string): this {
    for (const [word, n] of countWords(this.tokenizer.tokenize(text, this.tokenizeOptions))) {
      this.set(word, (this.find(word) ?? 0) + n);
    }
    return this;
  }
}
