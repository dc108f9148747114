import { RAG_CONFIG } from "./config.js";
import { EmbeddingService } from "./embedding-service.js";
import { loggerFromCallback } from "./logger.js";
import { LlmMetadataExtractor } from "./metadata-extractor.js";
import { pdfLoader } from "./pdf-extractor.js";
import { createRecordBuffer, ingestDirectory, type IngestionReport } from "./pipeline.js";
import { PromptStore } from "./prompt-store.js";
import { saveRecords } from "./record-export.js";
import { retrieve } from "./retriever.js";
import type { SegmentationMode } from "./segmentation/index.js";
import type { DocumentLoader, Embedder, MetadataExtractor, QueryHit } from "./types.js";
import { ContentAddressedStore } from "./vector-store.js";

export interface PaperIndex {
  query(text: string): Promise<QueryHit[]>;
  report: IngestionReport;
  entryCount: number;
}

export interface PaperIndexOptions {
  apiKey: string;
  log: (msg: string) => void;
  dataDir?: string;
  databasesDir?: string;
  indexName?: string;
  promptsPath?: string;
  mode?: SegmentationMode;
  exportPath?: string;
  loader?: DocumentLoader;
  extractor?: MetadataExtractor;
  embedder?: Embedder;
}

/**
 * Ingests every paper under the data directory into the named index, saves it, and
 * returns a handle for similarity queries. Segments already in the index are skipped
 * by id, so re-running over the same papers adds nothing.
 */
export async function initPaperIndex(options: PaperIndexOptions): Promise<PaperIndex> {
  const logger = loggerFromCallback(options.log);
  const indexName = options.indexName ?? RAG_CONFIG.indexName;
  const dataDir = options.dataDir ?? RAG_CONFIG.dataDir;

  const embedder =
    options.embedder ??
    new EmbeddingService({
      apiKey: options.apiKey,
      logger,
      onProgress: (done, total) => options.log(`embedding: ${done}/${total}`),
    });

  let extractor = options.extractor;
  if (!extractor) {
    const prompts = await PromptStore.open(options.promptsPath ?? RAG_CONFIG.promptsPath);
    const template = prompts.require(RAG_CONFIG.metadataPromptCategory, 0);
    extractor = new LlmMetadataExtractor({ apiKey: options.apiKey, template, logger });
  }

  const store = new ContentAddressedStore({
    embedder,
    databasesDir: options.databasesDir ?? RAG_CONFIG.databasesDir,
    logger,
  });
  await store.loadOrCreate(indexName);

  options.log(`scanning ${dataDir} for papers...`);
  const buffer = createRecordBuffer();
  const report = await ingestDirectory(
    dataDir,
    { loader: options.loader ?? pdfLoader, extractor, mode: options.mode, logger },
    buffer.sink,
  );

  if (buffer.records.length > 0) {
    options.log(`indexing ${buffer.records.length} segments...`);
    await store.upsertMany(buffer.records);
  }
  await store.save(indexName);

  if (options.exportPath) {
    await saveRecords(buffer.records, options.exportPath);
    options.log(`wrote ${buffer.records.length} records to ${options.exportPath}`);
  }

  const entryCount = await store.size();
  const ingested = report.documents.filter((d) => d.status === "ingested").length;
  options.log(`index '${indexName}' ready: ${ingested} paper(s), ${entryCount} segments`);

  return {
    report,
    entryCount,
    query: (text) => retrieve(text, store),
  };
}
