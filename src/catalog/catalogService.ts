/**
 * Catalog service — the surface the entrypoints use
 *
 * Ingestion writes go through the pipeline; queries read a fresh catalog
 * snapshot and hand it to the matcher.
 */

import type { CatalogEntry, CatalogMatch, CycleResult } from "@/types";
import type { Db } from "@/db";
import { listCatalogEntries } from "@/db";
import { StorageError } from "@/errors";
import type { IngestionPipeline } from "@/ingestion";
import type { EmbeddingIndex, SemanticMatcher } from "@/matching";

export interface CatalogServiceDeps {
  db: Db;
  pipeline: IngestionPipeline;
  matcher: SemanticMatcher;
  index: EmbeddingIndex;
}

export class CatalogService {
  private readonly db: Db;
  private readonly pipeline: IngestionPipeline;
  private readonly matcher: SemanticMatcher;
  private readonly index: EmbeddingIndex;

  constructor(deps: CatalogServiceDeps) {
    this.db = deps.db;
    this.pipeline = deps.pipeline;
    this.matcher = deps.matcher;
    this.index = deps.index;
  }

  runCycle(): Promise<CycleResult> {
    return this.pipeline.runCycle();
  }

  /**
   * All entries in insertion order
   *
   * @throws {StorageError} When the catalog cannot be read
   */
  listAll(): CatalogEntry[] {
    try {
      return listCatalogEntries(this.db);
    } catch (err) {
      throw new StorageError("catalog read", err);
    }
  }

  /**
   * @throws {StorageError} When the catalog cannot be read
   */
  bestMatch(query: string): Promise<CatalogMatch | null> {
    if (query.trim() === "") {
      return Promise.resolve(null);
    }
    return this.matcher.bestMatch(query, this.listAll());
  }

  /**
   * Drop every embedding and recompute them for the current catalog
   */
  async rebuildIndex(): Promise<number> {
    await this.index.reset();
    await this.index.sync(this.listAll());
    return this.index.size;
  }
}
