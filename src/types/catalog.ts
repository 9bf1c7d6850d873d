/**
 * Catalog type definitions
 */

/**
 * A catalogued media file
 *
 * `canonicalKey` is the deduplication identity produced by the canonicalizer.
 */
export type CatalogEntry = {
  canonicalKey: string;
  description: string;
  fileHandle: string;
};

/**
 * Catalog entry row (database entity)
 */
export type CatalogEntryRow = {
  id: number;
  canonical_key: string;
  description: string;
  file_handle: string;
  created_at: string;
};

/**
 * Outcome of a batch insert
 *
 * - inserted: new keys written
 * - skipped: keys already present (first write wins)
 * - failed: entries not attempted or rejected after a storage error
 */
export type InsertManyResult = {
  attempted: number;
  inserted: number;
  skipped: number;
  failed: number;
};

/**
 * Canonical key split back into its parts
 */
export type ParsedCanonicalKey = {
  title: string;
  year?: string;
};
