/**
 * Ingestion cursor repository
 *
 * Durable marker of the last consumed message per channel stream.
 */

import type { IngestionCursorRow } from "@/types";
import type { Db } from "../connection";

/**
 * Last consumed message id, or null when the stream was never read
 */
export function getCursor(db: Db, streamKey: string): number | null {
  const row = db
    .prepare("SELECT * FROM ingestion_cursor WHERE stream_key = ?")
    .get(streamKey) as IngestionCursorRow | undefined;

  return row ? row.last_consumed_id : null;
}

/**
 * Advance the cursor to `messageId`
 *
 * The cursor never moves backwards: a smaller id than the stored one leaves
 * the row untouched.
 *
 * @returns true if the stored value changed
 */
export function advanceCursor(
  db: Db,
  streamKey: string,
  messageId: number,
): boolean {
  const result = db
    .prepare(
      `
      INSERT INTO ingestion_cursor (stream_key, last_consumed_id)
      VALUES (?, ?)
      ON CONFLICT(stream_key) DO UPDATE SET
        last_consumed_id = excluded.last_consumed_id,
        updated_at = datetime('now')
      WHERE excluded.last_consumed_id > ingestion_cursor.last_consumed_id
    `,
    )
    .run(streamKey, messageId);

  return result.changes > 0;
}
