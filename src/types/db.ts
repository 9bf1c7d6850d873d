/**
 * Database entity types for bookkeeping tables
 */

export type IngestionCursorRow = {
  stream_key: string;
  last_consumed_id: number;
  updated_at: string;
};

/**
 * Run status for lifecycle helpers
 */
export type RunStatus = "success" | "failure";

/**
 * Ingestion run entity
 */
export type IngestionRun = {
  id: number;
  stream_key: string;
  started_at: string;
  finished_at: string | null;
  status: RunStatus | null;
  messages_fetched: number | null;
  messages_consumed: number | null;
  entries_staged: number | null;
  entries_inserted: number | null;
  entries_skipped: number | null;
  entries_failed: number | null;
  error_code: string | null;
};

/**
 * Ingestion run finish/update input
 */
export type IngestionRunUpdate = {
  finished_at?: string;
  status?: RunStatus;
  messages_fetched?: number;
  messages_consumed?: number;
  entries_staged?: number;
  entries_inserted?: number;
  entries_skipped?: number;
  entries_failed?: number;
  error_code?: string | null;
};
