import type { SplitStrategy } from "./types.js";

// Terminal punctuation, whitespace, then an uppercase letter or digit.
// Abbreviations such as "et al. Smith" will split; accepted.
const SENTENCE_BOUNDARY = /(?<=[.!?])\s+(?=[\p{Lu}0-9])/u;

export class SentenceSplitter implements SplitStrategy {
  readonly name = "sentence";

  split(text: string): string[] {
    return text.split(SENTENCE_BOUNDARY);
  }
}
