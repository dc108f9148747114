import path from "node:path";

export const RAG_CONFIG = {
  dataDir: path.resolve("data"),
  databasesDir: path.resolve("databases"),
  indexName: "papers",
  promptsPath: path.resolve("config/prompts.json"),
  documentExtension: ".pdf",

  embeddingModel: "qwen/qwen3-embedding-8b",
  embeddingBatchSize: 20,
  embeddingConcurrency: 1,

  metadataModel: "qwen/qwen3.5-27b",
  metadataPromptCategory: "document_metadata",
  metadataSnippetLength: 1000,

  queryPrefix: "Instruct: Retrieve relevant sentences from scientific papers\nQuery: ",

  segmentationMode: "sentence",
  citationSimilarityThreshold: 0.8,

  requestTimeoutMs: 60_000,
  maxRetries: 2,
  retryBaseDelayMs: 500,

  topK: 5,
  scoreThreshold: 0.3,
} as const;
