import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import { assertString, EmbeddingError } from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { callWithTimeout, withRetry } from "./resilience.js";
import type { Embedder } from "./types.js";

const OPENROUTER_EMBEDDINGS_URL = "https://openrouter.ai/api/v1/embeddings";

const EmbeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()) })),
});

export interface EmbeddingServiceOptions {
  apiKey: string;
  model?: string;
  batchSize?: number;
  concurrency?: number;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseDelayMs?: number;
  logger?: Logger;
  onProgress?: (done: number, total: number) => void;
}

export class EmbeddingService implements Embedder {
  private readonly model: string;
  private readonly batchSize: number;
  private readonly concurrency: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly logger: Logger;

  constructor(private readonly options: EmbeddingServiceOptions) {
    this.model = options.model ?? RAG_CONFIG.embeddingModel;
    this.batchSize = options.batchSize ?? RAG_CONFIG.embeddingBatchSize;
    this.concurrency = options.concurrency ?? RAG_CONFIG.embeddingConcurrency;
    this.timeoutMs = options.timeoutMs ?? RAG_CONFIG.requestTimeoutMs;
    this.maxRetries = options.maxRetries ?? RAG_CONFIG.maxRetries;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? RAG_CONFIG.retryBaseDelayMs;
    this.logger = options.logger ?? consoleLogger;
  }

  private async embedBatch(batch: string[]): Promise<number[][]> {
    const res = await callWithTimeout("embedding request", this.timeoutMs, (signal) =>
      fetch(OPENROUTER_EMBEDDINGS_URL, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ model: this.model, input: batch }),
        signal,
      }),
    );

    if (!res.ok) {
      const text = await res.text();
      throw new EmbeddingError(`Embedding API error (${res.status}): ${text}`, res.status);
    }

    const json = EmbeddingResponseSchema.parse(await res.json());
    if (json.data.length !== batch.length) {
      throw new EmbeddingError(
        `Embedding API returned ${json.data.length} vectors for ${batch.length} inputs`,
      );
    }
    return json.data.map((item) => item.embedding);
  }

  async embed(texts: string[]): Promise<number[][]> {
    for (const [i, text] of texts.entries()) {
      assertString(text, `texts[${i}]`);
    }

    // Split into batches
    const batches: { texts: string[]; startIdx: number }[] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push({ texts: texts.slice(i, i + this.batchSize), startIdx: i });
    }

    const results: number[][] = new Array(texts.length);
    let completed = 0;

    // Process batches with concurrency limit
    const queue = [...batches];
    const workers = Array.from(
      { length: Math.min(this.concurrency, queue.length) },
      async () => {
        for (let batch = queue.shift(); batch; batch = queue.shift()) {
          const current = batch;
          const embeddings = await withRetry(() => this.embedBatch(current.texts), {
            label: "embedding",
            maxRetries: this.maxRetries,
            baseDelayMs: this.retryBaseDelayMs,
            logger: this.logger,
          });
          embeddings.forEach((embedding, j) => {
            results[current.startIdx + j] = embedding;
          });
          completed += current.texts.length;
          this.options.onProgress?.(Math.min(completed, texts.length), texts.length);
        }
      },
    );

    await Promise.all(workers);
    return results;
  }

  async embedQuery(query: string): Promise<number[]> {
    assertString(query, "query");
    const [embedding] = await this.embed([RAG_CONFIG.queryPrefix + query]);
    if (!embedding) {
      throw new EmbeddingError("Embedding API returned no vector for the query");
    }
    return embedding;
  }
}
