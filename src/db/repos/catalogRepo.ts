/**
 * Catalog repository
 *
 * Data access layer for catalog_entries table.
 */

import type {
  CatalogEntry,
  CatalogEntryRow,
  InsertManyResult,
} from "@/types";
import type { Db } from "../connection";
import { describeDbError } from "@/utils/dbErrors";
import * as logger from "@/logger";

function toEntry(row: CatalogEntryRow): CatalogEntry {
  return {
    canonicalKey: row.canonical_key,
    description: row.description,
    fileHandle: row.file_handle,
  };
}

/**
 * Insert catalog entries, first write wins
 *
 * Each entry is its own statement (and so its own implicit transaction):
 * - a key that already exists is skipped, never overwritten
 * - on a storage error (disk full, corruption) the entries before it stay
 *   persisted, the error is logged, and the call returns with the remainder
 *   counted as failed
 *
 * Never throws.
 */
export function insertCatalogEntries(
  db: Db,
  entries: readonly CatalogEntry[],
): InsertManyResult {
  const result: InsertManyResult = {
    attempted: entries.length,
    inserted: 0,
    skipped: 0,
    failed: 0,
  };

  if (entries.length === 0) {
    return result;
  }

  let index = 0;
  try {
    const statement = db.prepare(`
      INSERT INTO catalog_entries (canonical_key, description, file_handle)
      VALUES (?, ?, ?)
      ON CONFLICT(canonical_key) DO NOTHING
    `);

    for (; index < entries.length; index++) {
      const entry = entries[index];
      const info = statement.run(
        entry.canonicalKey,
        entry.description,
        entry.fileHandle,
      );
      if (info.changes > 0) {
        result.inserted++;
      } else {
        result.skipped++;
      }
    }
  } catch (err) {
    result.failed = entries.length - index;
    logger.error("Catalog batch insert stopped on storage error", {
      ...describeDbError(err),
      canonicalKey: entries[index]?.canonicalKey,
      inserted: result.inserted,
      skipped: result.skipped,
      failed: result.failed,
    });
  }

  return result;
}

/**
 * Full catalog snapshot, in insertion order
 */
export function listCatalogEntries(db: Db): CatalogEntry[] {
  const rows = db
    .prepare("SELECT * FROM catalog_entries ORDER BY id")
    .all() as CatalogEntryRow[];
  return rows.map(toEntry);
}

/**
 * Get a single entry by canonical key
 */
export function getCatalogEntry(db: Db, canonicalKey: string): CatalogEntry | null {
  const row = db
    .prepare("SELECT * FROM catalog_entries WHERE canonical_key = ?")
    .get(canonicalKey) as CatalogEntryRow | undefined;
  return row ? toEntry(row) : null;
}

export function countCatalogEntries(db: Db): number {
  const row = db
    .prepare("SELECT COUNT(*) AS count FROM catalog_entries")
    .get() as { count: number };
  return row.count;
}
