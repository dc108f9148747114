import type { DocumentMetadata, SegmentRecord, TextUnit } from "./types.js";

export function attachMetadata(unit: TextUnit, metadata: DocumentMetadata): SegmentRecord {
  return {
    sentence: unit.text,
    metadata: {
      title: metadata.title,
      authors: [...metadata.authors],
      year: metadata.year,
      citation: metadata.citation,
      phraseNumber: unit.position,
    },
  };
}
