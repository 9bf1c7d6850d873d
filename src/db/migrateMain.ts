/**
 * Migration entrypoint — applies pending migrations to DB_PATH
 *
 * Usage: npm run migrate
 */

import "dotenv/config";
import { openDb, closeDb } from "./connection";
import { runMigrations } from "./migrate";
import { DEFAULT_DB_PATH } from "@/constants/config";
import * as logger from "@/logger";

const db = openDb(process.env.DB_PATH || DEFAULT_DB_PATH);

try {
  runMigrations(db);
} catch (err) {
  logger.error("Migration failed", { error: logger.describeError(err) });
  process.exitCode = 1;
} finally {
  closeDb(db);
}
