/**
 * Catalog repository integration tests
 *
 * First write wins, mixed batches, and partial commits on storage errors,
 * against a real SQLite file.
 */

import { describe, it, expect, afterEach } from "vitest";
import type { CatalogEntry } from "@/types";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import {
  countCatalogEntries,
  getCatalogEntry,
  insertCatalogEntries,
  listCatalogEntries,
} from "@/db";

function entry(canonicalKey: string, fileHandle: string): CatalogEntry {
  return { canonicalKey, description: `About ${canonicalKey}`, fileHandle };
}

describe("catalogRepo", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should insert new entries and list them in insertion order", async () => {
    harness = await createTestDb();

    const result = insertCatalogEntries(harness.db, [
      entry("Heat (1995)", "file-1"),
      entry("Alien (1979)", "file-2"),
    ]);

    expect(result).toEqual({ attempted: 2, inserted: 2, skipped: 0, failed: 0 });
    expect(listCatalogEntries(harness.db).map((e) => e.canonicalKey)).toEqual([
      "Heat (1995)",
      "Alien (1979)",
    ]);
  });

  it("should keep the first write for a duplicate key", async () => {
    harness = await createTestDb();
    insertCatalogEntries(harness.db, [entry("Heat (1995)", "file-1")]);

    const result = insertCatalogEntries(harness.db, [
      { canonicalKey: "Heat (1995)", description: "Repost", fileHandle: "file-9" },
    ]);

    expect(result).toEqual({ attempted: 1, inserted: 0, skipped: 1, failed: 0 });
    expect(getCatalogEntry(harness.db, "Heat (1995)")).toEqual({
      canonicalKey: "Heat (1995)",
      description: "About Heat (1995)",
      fileHandle: "file-1",
    });
  });

  it("should persist only the new keys of a mixed batch", async () => {
    harness = await createTestDb();
    insertCatalogEntries(harness.db, [entry("Heat (1995)", "file-1")]);

    const result = insertCatalogEntries(harness.db, [
      entry("Alien (1979)", "file-2"),
      entry("Heat (1995)", "file-3"),
      entry("Alien (1979)", "file-4"),
    ]);

    expect(result).toEqual({ attempted: 3, inserted: 1, skipped: 2, failed: 0 });
    expect(countCatalogEntries(harness.db)).toBe(2);
    expect(getCatalogEntry(harness.db, "Alien (1979)")?.fileHandle).toBe("file-2");
  });

  it("should accept an empty canonical key", async () => {
    harness = await createTestDb();

    const result = insertCatalogEntries(harness.db, [entry("", "file-1")]);

    expect(result.inserted).toBe(1);
    expect(getCatalogEntry(harness.db, "")?.fileHandle).toBe("file-1");
  });

  it("should keep entries written before a storage error and count the rest as failed", async () => {
    harness = await createTestDb();
    harness.db.exec(`
      CREATE TRIGGER reject_poison BEFORE INSERT ON catalog_entries
      WHEN NEW.canonical_key = 'Poison (2000)'
      BEGIN
        SELECT RAISE(ABORT, 'simulated disk failure');
      END;
    `);

    const result = insertCatalogEntries(harness.db, [
      entry("Alpha (2001)", "file-1"),
      entry("Poison (2000)", "file-2"),
      entry("Gamma (2003)", "file-3"),
    ]);

    expect(result).toEqual({ attempted: 3, inserted: 1, skipped: 0, failed: 2 });
    expect(listCatalogEntries(harness.db).map((e) => e.canonicalKey)).toEqual([
      "Alpha (2001)",
    ]);
  });

  it("should return zero counts for an empty batch", async () => {
    harness = await createTestDb();

    expect(insertCatalogEntries(harness.db, [])).toEqual({
      attempted: 0,
      inserted: 0,
      skipped: 0,
      failed: 0,
    });
  });
});
