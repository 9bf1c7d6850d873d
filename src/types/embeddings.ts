/**
 * Embedding and matching type definitions
 */

import type { CatalogEntry } from "./catalog";

/**
 * Best match for a free-text query
 */
export type CatalogMatch = {
  entry: CatalogEntry;
  /** Cosine similarity in [-1, 1] */
  similarity: number;
};

/**
 * Persisted embedding (database entity)
 */
export type CatalogEmbeddingRow = {
  canonical_key: string;
  model: string;
  source_text: string;
  dimensions: number;
  vector: Buffer;
  computed_at: string;
};

/**
 * Embedding as held by the in-memory index
 */
export type StoredEmbedding = {
  canonicalKey: string;
  sourceText: string;
  vector: number[];
};
