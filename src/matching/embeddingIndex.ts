/**
 * Embedding index — canonical key → vector, derived from the catalog
 *
 * Maintained incrementally: a sync embeds only entries without a vector (or
 * whose embedding text changed) and forgets keys no longer in the snapshot.
 * When a database handle is given, vectors are also kept in the
 * catalog_embeddings side table so a restart does not recompute them.
 *
 * An entry whose embedding failed, or whose embedding text is blank, has no
 * vector and is not matchable until a later sync succeeds.
 */

import type { EmbeddingProvider } from "@/interfaces";
import type { CatalogEntry, Logger, StoredEmbedding } from "@/types";
import type { Db } from "@/db";
import { deleteEmbeddings, listEmbeddings, saveEmbeddings } from "@/db";
import { DEFAULT_EMBEDDING_BATCH_SIZE } from "@/constants/matching";
import { isSentinelDescription } from "@/metadata";
import { describeDbError } from "@/utils/dbErrors";
import * as logger from "@/logger";

export interface EmbeddingIndexDeps {
  provider: EmbeddingProvider;
  /** Persist vectors in catalog_embeddings when set */
  db?: Db;
  batchSize?: number;
}

/**
 * Text embedded for an entry: its description, or the canonical key when the
 * description is empty or a sentinel
 */
export function embeddingTextFor(entry: CatalogEntry): string {
  const description = entry.description.trim();
  if (description === "" || isSentinelDescription(description)) {
    return entry.canonicalKey;
  }
  return entry.description;
}

export class EmbeddingIndex {
  private readonly provider: EmbeddingProvider;
  private readonly db?: Db;
  private readonly batchSize: number;
  private readonly log: Logger;
  private readonly vectors = new Map<string, StoredEmbedding>();
  private loaded = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(deps: EmbeddingIndexDeps) {
    this.provider = deps.provider;
    this.db = deps.db;
    this.batchSize = Math.max(1, deps.batchSize ?? DEFAULT_EMBEDDING_BATCH_SIZE);
    this.log = logger.withContext({ model: deps.provider.model });
  }

  get size(): number {
    return this.vectors.size;
  }

  get(canonicalKey: string): number[] | undefined {
    return this.vectors.get(canonicalKey)?.vector;
  }

  /**
   * Embed a query with the same provider as the index
   */
  async embedQuery(text: string): Promise<number[]> {
    const [vector] = await this.provider.embed([text]);
    if (!vector) {
      throw new Error("Embedding provider returned no vector for the query");
    }
    return vector;
  }

  /**
   * Bring the index in line with a catalog snapshot
   *
   * Concurrent calls run one after another. Never rejects.
   */
  sync(entries: readonly CatalogEntry[]): Promise<void> {
    const run = this.queue.then(() => this.fill(entries));
    this.queue = run;
    return run;
  }

  /**
   * Drop every vector, in memory and persisted, for the current model
   */
  async reset(): Promise<void> {
    const run = this.queue.then(() => {
      this.vectors.clear();
      if (this.db) {
        try {
          const removed = deleteEmbeddings(this.db, this.provider.model);
          this.log.info("Embedding index reset", { removed });
        } catch (err) {
          this.log.warn("Persisted embeddings not cleared", describeDbError(err));
        }
      }
    });
    this.queue = run;
    await run;
  }

  private async fill(entries: readonly CatalogEntry[]): Promise<void> {
    this.loadPersisted();

    const live = new Set(entries.map((entry) => entry.canonicalKey));
    for (const key of this.vectors.keys()) {
      if (!live.has(key)) {
        this.vectors.delete(key);
      }
    }

    const missing = entries.filter(
      (entry) =>
        this.vectors.get(entry.canonicalKey)?.sourceText !== embeddingTextFor(entry),
    );
    if (missing.length === 0) {
      return;
    }

    const embeddable = missing.filter((entry) => {
      if (embeddingTextFor(entry).trim() === "") {
        this.log.warn("Entry has no text to embed; it stays unmatched", {
          canonicalKey: entry.canonicalKey,
        });
        return false;
      }
      return true;
    });
    if (embeddable.length === 0) {
      return;
    }

    this.log.debug("Embedding catalog entries", { count: embeddable.length });

    for (let start = 0; start < embeddable.length; start += this.batchSize) {
      await this.embedBatch(embeddable.slice(start, start + this.batchSize));
    }
  }

  /**
   * Embed one batch; a rejected batch is split in halves down to single
   * entries, so only the entries the provider refuses stay without a vector
   */
  private async embedBatch(batch: readonly CatalogEntry[]): Promise<void> {
    const texts = batch.map(embeddingTextFor);

    let vectors: number[][];
    try {
      vectors = await this.provider.embed(texts);
    } catch (err) {
      if (batch.length > 1) {
        this.log.warn("Embedding batch failed; splitting", {
          count: batch.length,
          error: logger.describeError(err),
        });
        const half = Math.ceil(batch.length / 2);
        await this.embedBatch(batch.slice(0, half));
        await this.embedBatch(batch.slice(half));
        return;
      }
      this.log.error("Embedding failed; entry stays unmatched", {
        canonicalKey: batch[0]?.canonicalKey,
        error: logger.describeError(err),
      });
      return;
    }

    if (vectors.length !== batch.length) {
      this.log.error("Embedding batch returned the wrong number of vectors", {
        expected: batch.length,
        received: vectors.length,
      });
      return;
    }

    const computed: StoredEmbedding[] = batch.map((entry, i) => ({
      canonicalKey: entry.canonicalKey,
      sourceText: texts[i],
      vector: vectors[i],
    }));
    for (const item of computed) {
      this.vectors.set(item.canonicalKey, item);
    }
    this.persist(computed);
  }

  private loadPersisted(): void {
    if (this.loaded || !this.db) {
      return;
    }
    this.loaded = true;

    try {
      const stored = listEmbeddings(this.db, this.provider.model);
      for (const item of stored) {
        this.vectors.set(item.canonicalKey, item);
      }
      this.log.debug("Persisted embeddings loaded", { count: stored.length });
    } catch (err) {
      this.log.warn("Persisted embeddings not loaded; recomputing", describeDbError(err));
    }
  }

  private persist(items: readonly StoredEmbedding[]): void {
    if (!this.db) {
      return;
    }

    try {
      saveEmbeddings(this.db, this.provider.model, items);
    } catch (err) {
      this.log.warn("Embeddings not persisted", describeDbError(err));
    }
  }
}
