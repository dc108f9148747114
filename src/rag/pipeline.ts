import { RAG_CONFIG } from "./config.js";
import { DocumentLoadError, MetadataExtractionError, describeError } from "./errors.js";
import { scanFiles } from "./file-scanner.js";
import { consoleLogger, type Logger } from "./logger.js";
import { attachMetadata } from "./metadata-attacher.js";
import {
  extractSection,
  findRepeatedLines,
  getSplitStrategy,
  removeRepeatedLines,
  segmentText,
  type SegmentationMode,
} from "./segmentation/index.js";
import type {
  DocumentLoader,
  DocumentMetadata,
  ExtractedDocument,
  MetadataExtractor,
  RecordSink,
  SegmentRecord,
} from "./types.js";

export interface IngestionDeps {
  loader: DocumentLoader;
  extractor: MetadataExtractor;
  mode?: SegmentationMode;
  documentExtension?: string;
  snippetLength?: number;
  citationThreshold?: number;
  logger?: Logger;
}

export type DocumentOutcome =
  | {
      status: "ingested";
      filePath: string;
      metadata: DocumentMetadata;
      recordCount: number;
      pagesRead: number;
      /** The reference list was reached before the last page. */
      stoppedEarly: boolean;
    }
  | {
      status: "failed";
      filePath: string;
      stage: "load" | "metadata";
      error: DocumentLoadError | MetadataExtractionError;
    };

export type FailedOutcome = Extract<DocumentOutcome, { status: "failed" }>;

export interface IngestionReport {
  documents: DocumentOutcome[];
  /** Files under the directory with another extension; listed, never opened. */
  skippedFiles: string[];
}

/** An accumulator sink for callers that want the run's records in memory. */
export function createRecordBuffer(): { records: SegmentRecord[]; sink: RecordSink } {
  const records: SegmentRecord[] = [];
  return { records, sink: (record) => void records.push(record) };
}

async function emitSegments(
  doc: ExtractedDocument,
  metadata: DocumentMetadata,
  deps: IngestionDeps,
  sink: RecordSink,
): Promise<{ recordCount: number; pagesRead: number; stoppedEarly: boolean }> {
  const strategy = getSplitStrategy(deps.mode ?? RAG_CONFIG.segmentationMode);
  const repeated = findRepeatedLines(doc.pages.map((p) => p.text));

  let nextPosition = 1;
  let pagesRead = 0;
  let contentStarted = false;

  for (const page of doc.pages) {
    pagesRead++;
    const cleaned = removeRepeatedLines(page.text, repeated);
    const { window, stop, startFound } = extractSection(cleaned, metadata.citation, {
      seekStart: !contentStarted,
      citationThreshold: deps.citationThreshold,
    });
    if (startFound) contentStarted = true;

    for (const unit of segmentText(window, strategy, nextPosition)) {
      await sink(attachMetadata(unit, metadata));
      nextPosition = unit.position + 1;
    }

    if (stop) {
      return {
        recordCount: nextPosition - 1,
        pagesRead,
        stoppedEarly: pagesRead < doc.pages.length,
      };
    }
  }

  return { recordCount: nextPosition - 1, pagesRead, stoppedEarly: false };
}

/**
 * Loads one document, asks the extractor for its metadata once, then cleans,
 * windows and segments each page until the reference list begins. Load and
 * metadata failures come back as a failed outcome; sink failures propagate.
 */
export async function processDocument(
  filePath: string,
  deps: IngestionDeps,
  sink: RecordSink,
): Promise<DocumentOutcome> {
  const logger = deps.logger ?? consoleLogger;

  let doc: ExtractedDocument;
  try {
    doc = await deps.loader.load(filePath);
  } catch (err) {
    const error = new DocumentLoadError(filePath, err);
    logger.error(error.message);
    return { status: "failed", filePath, stage: "load", error };
  }

  const snippet = (doc.pages[0]?.text ?? "").slice(
    0,
    deps.snippetLength ?? RAG_CONFIG.metadataSnippetLength,
  );

  let metadata: DocumentMetadata;
  try {
    metadata = await deps.extractor.extract(snippet);
  } catch (err) {
    const error = new MetadataExtractionError(doc.source, err);
    logger.error(error.message);
    return { status: "failed", filePath, stage: "metadata", error };
  }

  const result = await emitSegments(doc, metadata, deps, sink);
  logger.info(
    `${doc.source}: ${result.recordCount} segments from ${result.pagesRead}/${doc.pages.length} pages`,
    { title: metadata.title, stoppedEarly: result.stoppedEarly },
  );
  return { status: "ingested", filePath, metadata, ...result };
}

export async function ingestDirectory(
  dir: string,
  deps: IngestionDeps,
  sink: RecordSink,
): Promise<IngestionReport> {
  const logger = deps.logger ?? consoleLogger;
  const { documents, otherFiles } = await scanFiles(
    dir,
    deps.documentExtension ?? RAG_CONFIG.documentExtension,
  );

  logger.info(`Found ${documents.length} document(s) in ${dir}`);
  if (otherFiles.length > 0) {
    logger.info(`Skipping ${otherFiles.length} file(s) with other extensions`);
  }

  const outcomes: DocumentOutcome[] = [];
  for (const filePath of documents) {
    outcomes.push(await processDocument(filePath, deps, sink));
  }

  const failed = outcomes.filter((o): o is FailedOutcome => o.status === "failed");
  if (failed.length > 0) {
    logger.warn(`${failed.length} document(s) failed`, {
      files: failed.map((o) => `${o.filePath} (${o.stage}): ${describeError(o.error)}`),
    });
  }

  return { documents: outcomes, skippedFiles: otherFiles };
}
