/**
 * SQLite database connection
 *
 * Opens handles with the required pragmas. Handles are passed explicitly to
 * repositories and components; nothing here caches a connection.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

export type Db = Database.Database;

/**
 * Open a database connection
 *
 * Creates the parent directory for file paths (skipped for ":memory:").
 */
export function openDb(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);

  // Enable foreign keys (SQLite default is OFF)
  db.pragma("foreign_keys = ON");

  // WAL: readers keep seeing the last committed snapshot while a cycle writes
  db.pragma("journal_mode = WAL");

  return db;
}

/**
 * Close database connection (no-op if already closed)
 */
export function closeDb(db: Db): void {
  if (db.open) {
    db.close();
  }
}
