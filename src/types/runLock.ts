/**
 * Run lock type definitions
 *
 * Advisory lock that detects a second consumer on the same channel stream.
 */

/**
 * Run lock row (database entity)
 */
export type RunLockRow = {
  /** Lock name, one per channel stream ("ingestion:<stream>") */
  lock_name: string;

  /** Owner identifier (UUID per pipeline instance) */
  owner_id: string;

  /** SQLite datetime text */
  acquired_at: string;

  /** SQLite datetime text; an expired lock may be taken over */
  expires_at: string;

  updated_at: string;
};

/**
 * Lock acquisition result
 *
 * STORAGE means the lock table could not be read or written.
 */
export type RunLockAcquireResult =
  | { ok: true }
  | { ok: false; reason: "LOCKED" | "STORAGE"; error?: string };
