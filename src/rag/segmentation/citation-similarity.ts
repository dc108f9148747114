import { RAG_CONFIG } from "../config.js";

function normalizeWhitespace(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

function lcsLength(a: string, b: string): number {
  if (a.length === 0 || b.length === 0) return 0;
  // Two rolling rows over the shorter string
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let prev = new Array<number>(inner.length + 1).fill(0);
  let curr = new Array<number>(inner.length + 1).fill(0);

  for (let i = 1; i <= outer.length; i++) {
    const ch = outer[i - 1];
    for (let j = 1; j <= inner.length; j++) {
      curr[j] =
        ch === inner[j - 1]
          ? (prev[j - 1] ?? 0) + 1
          : Math.max(prev[j] ?? 0, curr[j - 1] ?? 0);
    }
    [prev, curr] = [curr, prev];
  }

  return prev[inner.length] ?? 0;
}

/** 2·LCS / (|a| + |b|) over whitespace-normalized strings, in [0, 1]. */
export function citationSimilarity(a: string, b: string): number {
  const left = normalizeWhitespace(a);
  const right = normalizeWhitespace(b);
  const total = left.length + right.length;
  if (total === 0) return 1;
  return (2 * lcsLength(left, right)) / total;
}

export function isOwnCitation(
  candidate: string,
  ownCitation: string | null,
  threshold: number = RAG_CONFIG.citationSimilarityThreshold,
): boolean {
  if (!ownCitation || !ownCitation.trim()) return false;
  return citationSimilarity(candidate, ownCitation) > threshold;
}
