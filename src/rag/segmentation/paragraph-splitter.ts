import type { SplitStrategy } from "./types.js";

/**
 * PDF text rarely separates paragraphs with blank lines; a line that ends in a
 * period is taken as the end of a paragraph instead.
 */
const PARAGRAPH_BREAK = /(?<=\.)\s*\n/;

export class ParagraphSplitter implements SplitStrategy {
  readonly name = "paragraph";

  split(text: string): string[] {
    return text.split(PARAGRAPH_BREAK);
  }
}
