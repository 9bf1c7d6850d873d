/**
 * Schema Smoke Test
 *
 * Verifies that migrations produce the expected tables and are idempotent.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestDb, type TestDbHarness } from "../../helpers/testDb";
import { getAppliedMigrations, runMigrations } from "@/db";

describe("Schema Smoke Test", () => {
  let harness: TestDbHarness | null = null;

  afterEach(() => {
    if (harness) {
      harness.cleanup();
      harness = null;
    }
  });

  it("should create the catalog and bookkeeping tables", async () => {
    harness = await createTestDb();

    const tables = harness.db
      .prepare("SELECT name FROM sqlite_master WHERE type='table' ORDER BY name")
      .all() as { name: string }[];

    const tableNames = tables.map((t) => t.name);

    expect(tableNames).toContain("catalog_entries");
    expect(tableNames).toContain("ingestion_cursor");
    expect(tableNames).toContain("ingestion_runs");
    expect(tableNames).toContain("run_lock");
    expect(tableNames).toContain("catalog_embeddings");
    expect(tableNames).toContain("schema_migrations");
  });

  it("should record every migration once and apply nothing on a second run", async () => {
    harness = await createTestDb();

    expect([...getAppliedMigrations(harness.db)].sort()).toEqual([
      "0001_catalog_entries.sql",
      "0002_ingestion_cursor.sql",
      "0003_ingestion_runs.sql",
      "0004_run_lock.sql",
      "0005_catalog_embeddings.sql",
    ]);
    expect(runMigrations(harness.db)).toEqual([]);
  });

  it("should run in WAL mode", async () => {
    harness = await createTestDb();

    expect(harness.db.pragma("journal_mode", { simple: true })).toBe("wal");
  });
});
