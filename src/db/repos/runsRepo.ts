/**
 * Ingestion runs repository
 *
 * Data access layer for ingestion_runs table.
 */

import type { IngestionRun, IngestionRunUpdate } from "@/types";
import type { Db } from "../connection";

/**
 * Create a new ingestion run
 * Returns the run id
 */
export function createRun(db: Db, streamKey: string): number {
  const result = db
    .prepare("INSERT INTO ingestion_runs (stream_key) VALUES (?)")
    .run(streamKey);

  return Number(result.lastInsertRowid);
}

/**
 * Update/finish an ingestion run
 */
export function finishRun(db: Db, runId: number, update: IngestionRunUpdate): void {
  const fields: string[] = [];
  const values: Array<string | number | null> = [];

  const columns: Array<keyof IngestionRunUpdate> = [
    "finished_at",
    "status",
    "messages_fetched",
    "messages_consumed",
    "entries_staged",
    "entries_inserted",
    "entries_skipped",
    "entries_failed",
    "error_code",
  ];

  for (const column of columns) {
    const value = update[column];
    if (value !== undefined) {
      fields.push(`${column} = ?`);
      values.push(value);
    }
  }

  if (fields.length === 0) {
    return;
  }

  values.push(runId);
  db.prepare(`UPDATE ingestion_runs SET ${fields.join(", ")} WHERE id = ?`).run(
    ...values,
  );
}

export function getRunById(db: Db, id: number): IngestionRun | undefined {
  return db.prepare("SELECT * FROM ingestion_runs WHERE id = ?").get(id) as
    | IngestionRun
    | undefined;
}

/**
 * Most recent run for a stream
 */
export function getLatestRun(db: Db, streamKey: string): IngestionRun | undefined {
  return db
    .prepare(
      "SELECT * FROM ingestion_runs WHERE stream_key = ? ORDER BY id DESC LIMIT 1",
    )
    .get(streamKey) as IngestionRun | undefined;
}
