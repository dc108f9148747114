import type { SegmentationMode, SplitStrategy } from "./types.js";
import { SentenceSplitter } from "./sentence-splitter.js";
import { ParagraphSplitter } from "./paragraph-splitter.js";

const registry = new Map<string, SplitStrategy>();

export function registerSplitStrategy(strategy: SplitStrategy): void {
  registry.set(strategy.name, strategy);
}

export function getSplitStrategy(name: string): SplitStrategy {
  const strategy = registry.get(name);
  if (!strategy) {
    throw new Error(`Unknown segmentation mode: ${name}`);
  }
  return strategy;
}

// Register defaults
registerSplitStrategy(new SentenceSplitter());
registerSplitStrategy(new ParagraphSplitter());

export { SentenceSplitter } from "./sentence-splitter.js";
export { ParagraphSplitter } from "./paragraph-splitter.js";
export { segmentText, isCaption, isBareCitation } from "./segmenter.js";
export { findRepeatedLines, removeRepeatedLines, cleanPage } from "./text-cleaner.js";
export type { RepeatedLines } from "./text-cleaner.js";
export { extractSection } from "./section-extractor.js";
export type { SectionWindow, ExtractSectionOptions } from "./section-extractor.js";
export { citationSimilarity, isOwnCitation } from "./citation-similarity.js";
export type { SegmentationMode, SplitStrategy } from "./types.js";
