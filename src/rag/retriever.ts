import { RAG_CONFIG } from "./config.js";
import type { QueryHit } from "./types.js";

export interface Searchable {
  query(text: string, k: number): Promise<QueryHit[]>;
}

export interface RetrieveOptions {
  topK?: number;
  scoreThreshold?: number;
}

export async function retrieve(
  query: string,
  store: Searchable,
  { topK = RAG_CONFIG.topK, scoreThreshold = RAG_CONFIG.scoreThreshold }: RetrieveOptions = {},
): Promise<QueryHit[]> {
  const hits = await store.query(query, topK);
  return hits.filter((hit) => hit.score >= scoreThreshold);
}
