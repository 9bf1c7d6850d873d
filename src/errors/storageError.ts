/**
 * Storage error — wraps a SQLite failure with the operation that hit it
 */

import { describeDbError } from "@/utils/dbErrors";

export class StorageError extends Error {
  public readonly operation: string;
  /** SQLite result code (e.g. SQLITE_FULL) when available */
  public readonly code: string | null;

  constructor(operation: string, cause: unknown) {
    const details = describeDbError(cause);
    super(`${operation} failed: ${details.message}`);
    this.name = "StorageError";
    this.operation = operation;
    this.code = details.code;
  }
}
