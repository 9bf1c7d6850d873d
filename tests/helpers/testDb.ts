/**
 * Test Database Harness
 *
 * Creates fresh temporary SQLite databases per test.
 * Runs real migrations, provides DB handle, handles cleanup.
 *
 * Usage:
 *   const harness = await createTestDb();
 *   // ... pass harness.db to repos and components ...
 *   harness.cleanup();
 */

import { mkdirSync, rmSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { closeDb, openDb, runMigrations, type Db } from "@/db";

export interface TestDbHarness {
  /** The SQLite database connection */
  db: Db;
  /** Path to the temp database file */
  dbPath: string;
  /** Clean up: close connection and delete temp file */
  cleanup: () => void;
}

/**
 * Generate a unique temp file path for a test database
 */
function generateTempDbPath(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 8);
  const filename = `test-${timestamp}-${random}.db`;
  const tempDir = join(tmpdir(), "channel-media-catalog-tests");

  mkdirSync(tempDir, { recursive: true });

  return join(tempDir, filename);
}

function removeDbFiles(dbPath: string): void {
  rmSync(dbPath, { force: true });
  rmSync(dbPath + "-wal", { force: true });
  rmSync(dbPath + "-shm", { force: true });
}

/**
 * Create a fresh test database with all migrations applied.
 *
 * IMPORTANT: Always call cleanup() after the test completes. Handles the
 * test opens itself on `dbPath` must be closed before that.
 */
export async function createTestDb(): Promise<TestDbHarness> {
  const dbPath = generateTempDbPath();
  const db = openDb(dbPath);
  runMigrations(db);

  const cleanup = () => {
    closeDb(db);
    try {
      removeDbFiles(dbPath);
    } catch {
      // Leftover temp files are harmless
    }
  };

  return { db, dbPath, cleanup };
}
