import { cp, rm } from "node:fs/promises";
import path from "node:path";
import { LocalIndex, type IndexItem } from "vectra";
import { z } from "zod";
import { RAG_CONFIG } from "./config.js";
import {
  assertString,
  EmbeddingError,
  IndexNotFoundError,
  IndexNotOpenError,
  InvalidArgumentError,
} from "./errors.js";
import { consoleLogger, type Logger } from "./logger.js";
import { canonicalJson, computeVectorId } from "./vector-id.js";
import type {
  Embedder,
  QueryHit,
  SegmentMetadata,
  SegmentRecord,
  VectorEntry,
} from "./types.js";

const SegmentMetadataSchema = z.object({
  title: z.string().nullable(),
  authors: z.array(z.string()),
  year: z.string().nullable(),
  citation: z.string().nullable(),
  phraseNumber: z.number().int().positive(),
});

export interface ContentAddressedStoreOptions {
  embedder: Embedder;
  databasesDir?: string;
  logger?: Logger;
}

function checkVector(vector: number[] | undefined): number[] {
  if (!vector || vector.length === 0 || !vector.every((v) => Number.isFinite(v))) {
    throw new EmbeddingError("Embedder returned an empty or non-numeric vector");
  }
  return vector;
}

function decodeItem(item: IndexItem): Omit<VectorEntry, "embedding"> {
  const { text, metadata } = item.metadata;
  if (typeof text !== "string" || typeof metadata !== "string") {
    throw new Error(`Index item ${item.id} is missing its text or metadata`);
  }
  return {
    id: item.id,
    text,
    metadata: SegmentMetadataSchema.parse(JSON.parse(metadata)),
  };
}

/**
 * Deduplicated vector index. An entry's id is derived from its text and metadata, so
 * ingesting the same segment twice leaves a single entry. Each named index is a vectra
 * folder under the databases directory.
 */
export class ContentAddressedStore {
  private readonly databasesDir: string;
  private readonly logger: Logger;
  private index: LocalIndex | null = null;
  private currentName: string | null = null;

  constructor(private readonly options: ContentAddressedStoreOptions) {
    this.databasesDir = options.databasesDir ?? RAG_CONFIG.databasesDir;
    this.logger = options.logger ?? consoleLogger;
  }

  get name(): string | null {
    return this.currentName;
  }

  private indexPath(name: string): string {
    if (!name || name !== path.basename(name) || name === "." || name === "..") {
      throw new InvalidArgumentError("name", "a plain directory name", name);
    }
    return path.join(this.databasesDir, name);
  }

  private requireIndex(): LocalIndex {
    if (!this.index) throw new IndexNotOpenError();
    return this.index;
  }

  async exists(name: string): Promise<boolean> {
    return new LocalIndex(this.indexPath(name)).isIndexCreated();
  }

  /** Opens an empty index under `name`, replacing any index already stored there. */
  async create(name: string): Promise<void> {
    const indexPath = this.indexPath(name);
    await rm(indexPath, { recursive: true, force: true });
    const index = new LocalIndex(indexPath);
    await index.createIndex();
    this.index = index;
    this.currentName = name;
    this.logger.info(`Created index '${name}'`);
  }

  async load(name: string): Promise<void> {
    const index = new LocalIndex(this.indexPath(name));
    if (!(await index.isIndexCreated())) {
      throw new IndexNotFoundError(name);
    }
    this.index = index;
    this.currentName = name;
    this.logger.info(`Loaded index '${name}' (${await this.size()} entries)`);
  }

  async loadOrCreate(name: string): Promise<void> {
    if (await this.exists(name)) {
      await this.load(name);
    } else {
      await this.create(name);
    }
  }

  async delete(name: string): Promise<void> {
    await rm(this.indexPath(name), { recursive: true, force: true });
    if (this.currentName === name) {
      this.index = null;
      this.currentName = null;
    }
    this.logger.info(`Deleted index '${name}'`);
  }

  /**
   * Embeds and inserts one segment, returning its id. When an entry with the same id
   * already exists nothing is embedded or written and the existing id is returned.
   */
  async upsert(text: string, metadata: SegmentMetadata): Promise<string> {
    const index = this.requireIndex();
    const id = computeVectorId(text, metadata);
    if (await index.getItem(id)) return id;

    const [embedding] = await this.options.embedder.embed([text]);
    const vector = checkVector(embedding);
    // vectra metadata values must be scalars, so the structured metadata is kept as JSON
    await index.insertItem({
      id,
      vector,
      metadata: { text, metadata: canonicalJson(metadata) },
    });
    return id;
  }

  /** Same contract as `upsert`, with one embedding pass and one index write for the new records. */
  async upsertMany(records: SegmentRecord[]): Promise<string[]> {
    const index = this.requireIndex();
    if (records.length === 0) return [];

    const ids = records.map((r) => computeVectorId(r.sentence, r.metadata));
    const fresh: Array<{ id: string; record: SegmentRecord }> = [];
    const seen = new Set<string>();
    for (const [i, record] of records.entries()) {
      const id = ids[i];
      if (id === undefined || seen.has(id)) continue;
      seen.add(id);
      if (!(await index.getItem(id))) fresh.push({ id, record });
    }
    if (fresh.length === 0) return ids;

    const embeddings = await this.options.embedder.embed(fresh.map((f) => f.record.sentence));
    const vectors = fresh.map((_, i) => checkVector(embeddings[i]));

    await index.beginUpdate();
    try {
      for (const [i, { id, record }] of fresh.entries()) {
        const vector = vectors[i];
        if (vector === undefined) continue;
        await index.insertItem({
          id,
          vector,
          metadata: { text: record.sentence, metadata: canonicalJson(record.metadata) },
        });
      }
      await index.endUpdate();
    } catch (err) {
      index.cancelUpdate();
      throw err;
    }
    return ids;
  }

  /** Persists the open index under `name` (default: the name it was opened with). */
  async save(name?: string): Promise<void> {
    this.requireIndex();
    const source = this.currentName;
    const target = name ?? source;
    if (source === null || target === null) throw new IndexNotOpenError();

    if (target !== source) {
      const targetPath = this.indexPath(target);
      await rm(targetPath, { recursive: true, force: true });
      await cp(this.indexPath(source), targetPath, { recursive: true });
    }
    this.logger.info(`Saved index '${target}' (${await this.size()} entries)`);
  }

  async size(): Promise<number> {
    if (!this.index) return 0;
    return (await this.index.listItems()).length;
  }

  async entries(): Promise<VectorEntry[]> {
    const items = await this.requireIndex().listItems();
    return items.map((item) => ({ ...decodeItem(item), embedding: item.vector }));
  }

  async query(text: string, k: number = RAG_CONFIG.topK): Promise<QueryHit[]> {
    assertString(text, "text");
    const index = this.index;
    if (!index) {
      this.logger.warn("Query issued before an index was opened");
      return [];
    }
    const count = Math.min(k, (await index.listItems()).length);
    if (count <= 0) return [];

    const queryVector = checkVector(await this.options.embedder.embedQuery(text));
    const results = await index.queryItems(queryVector, count);
    return results.map((r) => ({ ...decodeItem(r.item), score: r.score }));
  }
}
