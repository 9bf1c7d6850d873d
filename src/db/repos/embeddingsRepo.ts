/**
 * Catalog embeddings repository
 *
 * Side table for the derived embedding index, keyed by (canonical_key, model).
 * Rows can be dropped at any time; they are recomputed from the catalog.
 */

import type { CatalogEmbeddingRow, StoredEmbedding } from "@/types";
import type { Db } from "../connection";
import { decodeVector, encodeVector } from "@/utils/vector";

/**
 * Load every stored embedding for a model
 */
export function listEmbeddings(db: Db, model: string): StoredEmbedding[] {
  const rows = db
    .prepare("SELECT * FROM catalog_embeddings WHERE model = ?")
    .all(model) as CatalogEmbeddingRow[];

  return rows.map((row) => ({
    canonicalKey: row.canonical_key,
    sourceText: row.source_text,
    vector: decodeVector(row.vector),
  }));
}

/**
 * Upsert embeddings for a model in one transaction
 */
export function saveEmbeddings(
  db: Db,
  model: string,
  embeddings: readonly StoredEmbedding[],
): void {
  const statement = db.prepare(`
    INSERT INTO catalog_embeddings (canonical_key, model, source_text, dimensions, vector)
    VALUES (?, ?, ?, ?, ?)
    ON CONFLICT(canonical_key, model) DO UPDATE SET
      source_text = excluded.source_text,
      dimensions = excluded.dimensions,
      vector = excluded.vector,
      computed_at = datetime('now')
  `);

  const saveAll = db.transaction((items: readonly StoredEmbedding[]) => {
    for (const item of items) {
      statement.run(
        item.canonicalKey,
        model,
        item.sourceText,
        item.vector.length,
        encodeVector(item.vector),
      );
    }
  });

  saveAll(embeddings);
}

export function deleteEmbeddings(db: Db, model: string): number {
  return db.prepare("DELETE FROM catalog_embeddings WHERE model = ?").run(model)
    .changes;
}
