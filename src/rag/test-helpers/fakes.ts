import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type {
  DocumentLoader,
  DocumentMetadata,
  Embedder,
  ExtractedDocument,
  MetadataExtractor,
  SegmentMetadata,
} from "../types.js";

/** 26 letter counts plus a constant bias term, so no vector is all zeros. */
export function letterVector(text: string): number[] {
  const vector = new Array<number>(27).fill(0);
  vector[26] = 1;
  for (const ch of text.toLowerCase()) {
    const idx = ch.charCodeAt(0) - 97;
    if (idx >= 0 && idx < 26) vector[idx] = (vector[idx] ?? 0) + 1;
  }
  return vector;
}

export class FakeEmbedder implements Embedder {
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push(texts);
    return texts.map(letterVector);
  }

  async embedQuery(text: string): Promise<number[]> {
    return letterVector(text);
  }
}

export class FailingEmbedder implements Embedder {
  constructor(private readonly error: Error) {}

  async embed(): Promise<number[][]> {
    throw this.error;
  }

  async embedQuery(): Promise<number[]> {
    throw this.error;
  }
}

/** Serves page texts by file basename; unknown files fail like a corrupt PDF. */
export class FakeLoader implements DocumentLoader {
  constructor(private readonly documents: Record<string, string[]>) {}

  async load(filePath: string): Promise<ExtractedDocument> {
    const source = path.basename(filePath);
    const pages = this.documents[source];
    if (!pages) throw new Error(`Invalid PDF structure: ${source}`);
    return {
      source,
      filePath,
      pages: pages.map((text, i) => ({ pageNumber: i + 1, text })),
    };
  }
}

export class FakeExtractor implements MetadataExtractor {
  readonly snippets: string[] = [];

  constructor(
    private readonly metadata: DocumentMetadata,
    private readonly failWhen: (snippet: string) => boolean = () => false,
  ) {}

  async extract(snippet: string): Promise<DocumentMetadata> {
    this.snippets.push(snippet);
    if (this.failWhen(snippet)) throw new Error("model returned malformed JSON");
    return this.metadata;
  }
}

export const SAMPLE_METADATA: DocumentMetadata = {
  title: "Widget Dynamics",
  authors: ["Tester, T.", "Sample, S."],
  year: "2024",
  citation: "Tester, T., & Sample, S. (2024). Widget Dynamics. Journal of Tests, 1(1), 1-10.",
};

export function segmentMetadata(phraseNumber: number): SegmentMetadata {
  return { ...SAMPLE_METADATA, authors: [...SAMPLE_METADATA.authors], phraseNumber };
}

export async function makeTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "paper-sift-"));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}
