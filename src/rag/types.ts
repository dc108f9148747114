export interface PageContent {
  pageNumber: number;
  text: string;
}

export interface ExtractedDocument {
  source: string;
  filePath: string;
  pages: PageContent[];
}

export interface DocumentMetadata {
  title: string | null;
  authors: string[];
  year: string | null;
  citation: string | null;
}

export interface SegmentMetadata extends DocumentMetadata {
  /** 1-based, restarts for every document. */
  phraseNumber: number;
}

export interface TextUnit {
  text: string;
  position: number;
}

export interface SegmentRecord {
  sentence: string;
  metadata: SegmentMetadata;
}

export interface VectorEntry {
  id: string;
  embedding: number[];
  text: string;
  metadata: SegmentMetadata;
}

export interface QueryHit {
  id: string;
  text: string;
  metadata: SegmentMetadata;
  score: number;
}

export type RecordSink = (record: SegmentRecord) => void | Promise<void>;

export interface DocumentLoader {
  load(filePath: string): Promise<ExtractedDocument>;
}

export interface MetadataExtractor {
  extract(snippet: string): Promise<DocumentMetadata>;
}

export interface Embedder {
  embed(texts: string[]): Promise<number[][]>;
  embedQuery(text: string): Promise<number[]>;
}
