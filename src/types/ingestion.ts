/**
 * Ingestion type definitions
 */

/**
 * Terminal state of one ingestion cycle
 *
 * - completed: messages consumed and staged entries committed
 * - busy: another cycle is already running in this process
 * - rate_limited: channel asked us to back off; slept, then aborted
 * - duplicate_consumer: another consumer holds the stream
 * - unauthorized: channel rejected the credentials or chat id
 * - channel_unavailable: network or server failure talking to the channel
 * - storage_error: cursor or run bookkeeping could not be persisted
 * - failed: anything else
 */
export type CycleStatus =
  | "completed"
  | "busy"
  | "rate_limited"
  | "duplicate_consumer"
  | "unauthorized"
  | "channel_unavailable"
  | "storage_error"
  | "failed";

export type CycleCounters = {
  messages_fetched: number;
  messages_consumed: number;
  entries_staged: number;
  entries_inserted: number;
  entries_skipped: number;
  entries_failed: number;
};

export type CycleResult = {
  status: CycleStatus;
  runId: number | null;
  counters: CycleCounters;
  /** Present when the channel advised a back-off */
  retryAfterSeconds?: number;
};

/**
 * Mutable accumulator handed to the run lifecycle callback
 */
export type RunAccumulator = {
  counters: CycleCounters;
  errorCode: string | null;
};
