/**
 * Semantic matcher — best catalog entry for a free-text query
 *
 * Cosine similarity between the query embedding and each entry's vector;
 * the highest wins (earliest snapshot entry on ties). Below the similarity
 * floor there is no match. An unmatched query returns null, never throws.
 */

import type { CatalogEntry, CatalogMatch } from "@/types";
import { DEFAULT_SIMILARITY_FLOOR } from "@/constants/matching";
import { cosineSimilarity } from "@/utils/vector";
import { EmbeddingIndex } from "./embeddingIndex";
import * as logger from "@/logger";

export interface SemanticMatcherDeps {
  index: EmbeddingIndex;
  similarityFloor?: number;
}

export class SemanticMatcher {
  private readonly index: EmbeddingIndex;
  readonly similarityFloor: number;

  constructor(deps: SemanticMatcherDeps) {
    this.index = deps.index;
    this.similarityFloor = deps.similarityFloor ?? DEFAULT_SIMILARITY_FLOOR;
  }

  async bestMatch(
    query: string,
    snapshot: readonly CatalogEntry[],
  ): Promise<CatalogMatch | null> {
    const text = query.trim();
    if (text === "" || snapshot.length === 0) {
      return null;
    }

    await this.index.sync(snapshot);
    if (this.index.size === 0) {
      logger.warn("No catalog entry has an embedding; nothing to match");
      return null;
    }

    let queryVector: number[];
    try {
      queryVector = await this.index.embedQuery(text);
    } catch (err) {
      logger.error("Query embedding failed", {
        error: logger.describeError(err),
      });
      return null;
    }

    let best: CatalogMatch | null = null;
    for (const entry of snapshot) {
      const vector = this.index.get(entry.canonicalKey);
      if (!vector || vector.length !== queryVector.length) {
        continue;
      }

      const similarity = cosineSimilarity(queryVector, vector);
      if (!best || similarity > best.similarity) {
        best = { entry, similarity };
      }
    }

    if (!best || best.similarity < this.similarityFloor) {
      logger.debug("No match above similarity floor", {
        bestSimilarity: best?.similarity ?? null,
        floor: this.similarityFloor,
      });
      return null;
    }

    return best;
  }
}
