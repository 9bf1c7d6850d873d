/**
 * Database error utilities
 *
 * Helpers for reporting database errors.
 */

/**
 * Extract message and SQLite result code from a thrown value
 *
 * better-sqlite3 errors carry `code` (e.g. "SQLITE_FULL", "SQLITE_CORRUPT").
 */
export function describeDbError(err: unknown): {
  message: string;
  code: string | null;
} {
  if (!(err instanceof Error)) {
    return { message: String(err), code: null };
  }

  const code =
    "code" in err && typeof err.code === "string" && err.code.startsWith("SQLITE")
      ? err.code
      : null;

  return { message: err.message, code };
}
