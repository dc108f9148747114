import type { QueryHit, SegmentMetadata } from "./types.js";

export interface SourceRef {
  label: string;
  phrases: number[];
}

export function sourceLabel(metadata: SegmentMetadata): string {
  if (metadata.citation) return metadata.citation;
  const authors = metadata.authors.length > 0 ? metadata.authors.join(", ") : "Unknown author";
  return `${authors} (${metadata.year ?? "n.d."}). ${metadata.title ?? "Untitled"}`;
}

export function formatHit(hit: QueryHit, rank: number): string {
  return (
    `[${rank}] ${hit.text}\n` +
    `    ${sourceLabel(hit.metadata)} · #${hit.metadata.phraseNumber} · score ${hit.score.toFixed(3)}`
  );
}

/** Groups hits by source, keeping first-seen order, with sorted phrase numbers. */
export function collectSources(hits: QueryHit[]): SourceRef[] {
  const sourceMap = new Map<string, Set<number>>();
  for (const hit of hits) {
    const label = sourceLabel(hit.metadata);
    const phrases = sourceMap.get(label) ?? new Set<number>();
    phrases.add(hit.metadata.phraseNumber);
    sourceMap.set(label, phrases);
  }

  const sources: SourceRef[] = [];
  for (const [label, phrases] of sourceMap) {
    sources.push({ label, phrases: [...phrases].sort((a, b) => a - b) });
  }
  return sources;
}

export function formatSourcesForUI(sources: SourceRef[]): string {
  return sources
    .map((s) => `${s.label} ${s.phrases.map((p) => `#${p}`).join(", ")}`)
    .join(" | ");
}
