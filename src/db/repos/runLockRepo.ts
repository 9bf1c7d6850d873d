/**
 * Run lock repository
 *
 * DB-based advisory lock with TTL, one per channel stream. A second process
 * consuming the same stream finds the lock held and aborts its cycle. The
 * lock is advisory: it detects, it does not prevent, a misconfigured
 * deployment.
 */

import type { RunLockRow, RunLockAcquireResult } from "@/types";
import type { Db } from "../connection";
import { RUN_LOCK_NAME_PREFIX, RUN_LOCK_TTL_SECONDS } from "@/constants/runLock";
import { describeDbError } from "@/utils/dbErrors";

export function runLockName(streamKey: string): string {
  return `${RUN_LOCK_NAME_PREFIX}${streamKey}`;
}

/**
 * Acquire the stream lock
 *
 * Inserts the lock, or takes it over if the current holder's lock expired.
 * Re-acquiring a lock this owner already holds refreshes it.
 *
 * @param ownerId - Unique consumer identifier (UUID)
 */
export function acquireRunLock(
  db: Db,
  streamKey: string,
  ownerId: string,
  ttlSeconds: number = RUN_LOCK_TTL_SECONDS,
): RunLockAcquireResult {
  try {
    // ON CONFLICT ... WHERE makes the check-and-take a single statement
    const result = db
      .prepare(
        `
      INSERT INTO run_lock (lock_name, owner_id, acquired_at, expires_at)
      VALUES (
        ?,
        ?,
        datetime('now'),
        datetime('now', '+' || ? || ' seconds')
      )
      ON CONFLICT(lock_name) DO UPDATE SET
        owner_id = excluded.owner_id,
        acquired_at = excluded.acquired_at,
        expires_at = excluded.expires_at,
        updated_at = datetime('now')
      WHERE datetime('now') >= run_lock.expires_at
         OR run_lock.owner_id = excluded.owner_id
    `,
      )
      .run(runLockName(streamKey), ownerId, ttlSeconds);

    if (result.changes > 0) {
      return { ok: true };
    }

    return { ok: false, reason: "LOCKED" };
  } catch (err) {
    return { ok: false, reason: "STORAGE", error: describeDbError(err).message };
  }
}

/**
 * Release the stream lock if owned by `ownerId`
 *
 * @returns true if the lock was released
 */
export function releaseRunLock(db: Db, streamKey: string, ownerId: string): boolean {
  const result = db
    .prepare("DELETE FROM run_lock WHERE lock_name = ? AND owner_id = ?")
    .run(runLockName(streamKey), ownerId);

  return result.changes > 0;
}

/**
 * Current lock row, or null if the stream is unlocked
 */
export function getRunLock(db: Db, streamKey: string): RunLockRow | null {
  const row = db
    .prepare("SELECT * FROM run_lock WHERE lock_name = ?")
    .get(runLockName(streamKey)) as RunLockRow | undefined;

  return row ?? null;
}
