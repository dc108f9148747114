import { RAG_CONFIG } from "../config.js";
import { isOwnCitation } from "./citation-similarity.js";

// Whole words only: "abstraction" or "preferences" must not match.
const SECTION_START = /(?<!\p{L})(?:abstract|resumen|introduction|introducción)(?!\p{L})/iu;
const SECTION_END = /(?<!\p{L})(?:references|bibliography|referencias|bibliografía)(?!\p{L})/iu;

export interface SectionWindow {
  window: string;
  /** True once the reference list has been reached; later pages carry no content. */
  stop: boolean;
  /** A start heading was found on this page, so the content window is open. */
  startFound: boolean;
}

export interface ExtractSectionOptions {
  /**
   * Look for an abstract/introduction heading. Turn off for pages after the one where
   * a start heading was found.
   */
  seekStart?: boolean;
  citationThreshold?: number;
}

function dropSelfCitations(text: string, ownCitation: string | null, threshold: number): string {
  if (!ownCitation) return text;
  return text
    .split("\n")
    .filter((line) => !isOwnCitation(line, ownCitation, threshold))
    .join("\n");
}

export function extractSection(
  text: string,
  ownCitation: string | null,
  options: ExtractSectionOptions = {},
): SectionWindow {
  const { seekStart = true, citationThreshold = RAG_CONFIG.citationSimilarityThreshold } =
    options;
  const filtered = dropSelfCitations(text, ownCitation, citationThreshold);

  const startMatch = seekStart ? SECTION_START.exec(filtered) : null;
  const start = startMatch?.index ?? 0;
  const startFound = startMatch !== null;

  const endMatch = SECTION_END.exec(filtered.slice(start));
  if (endMatch) {
    return { window: filtered.slice(start, start + endMatch.index), stop: true, startFound };
  }
  return { window: filtered.slice(start), stop: false, startFound };
}
