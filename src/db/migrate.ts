/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ directory in order.
 */

import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import type { Db } from "./connection";
import * as logger from "@/logger";

export function defaultMigrationsDir(): string {
  return join(process.cwd(), "migrations");
}

/**
 * Ensure schema_migrations table exists
 */
function ensureMigrationsTable(db: Db): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Get list of applied migrations
 */
export function getAppliedMigrations(db: Db): Set<string> {
  const rows = db.prepare("SELECT version FROM schema_migrations").all() as {
    version: string;
  }[];
  return new Set(rows.map((r) => r.version));
}

/**
 * List migration files, sorted by name
 */
function listMigrationFiles(migrationsDir: string): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir);
  } catch (err) {
    logger.warn("Migrations directory not readable", {
      migrationsDir,
      error: logger.describeError(err),
    });
    return [];
  }

  return files.filter((f) => f.endsWith(".sql")).sort();
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Db, migrationsDir: string, filename: string): void {
  const sql = readFileSync(join(migrationsDir, filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Run all pending migrations on the given database
 *
 * @returns Names of the migrations applied by this call
 */
export function runMigrations(
  db: Db,
  migrationsDir: string = defaultMigrationsDir(),
): string[] {
  ensureMigrationsTable(db);

  const applied = getAppliedMigrations(db);
  const pending = listMigrationFiles(migrationsDir).filter(
    (f) => !applied.has(f),
  );

  if (pending.length === 0) {
    logger.debug("No pending migrations");
    return [];
  }

  logger.info("Applying migrations", { count: pending.length });

  for (const migration of pending) {
    logger.debug("Applying migration", { migration });
    applyMigration(db, migrationsDir, migration);
  }

  logger.info("Migrations complete", { applied: pending });
  return pending;
}
