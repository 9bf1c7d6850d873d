/**
 * Run lifecycle helpers — track ingestion cycles in the database
 *
 * One run = one ingestion cycle for one channel stream.
 * These helpers ensure every run is finalized (success or failure).
 */

import type { CycleCounters, RunAccumulator, RunStatus } from "@/types";
import type { Db } from "@/db";
import { createRun, finishRun as repoFinishRun } from "@/db";

/**
 * Start a new ingestion run
 *
 * @returns The run ID
 */
export function startRun(db: Db, streamKey: string): number {
  return createRun(db, streamKey);
}

/**
 * Finish an ingestion run with status, counters and error code
 */
export function finishRun(
  db: Db,
  runId: number,
  status: RunStatus,
  acc: RunAccumulator,
): void {
  repoFinishRun(db, runId, {
    finished_at: new Date().toISOString(),
    status,
    ...acc.counters,
    error_code: acc.errorCode,
  });
}

export function createCycleCounters(): CycleCounters {
  return {
    messages_fetched: 0,
    messages_consumed: 0,
    entries_staged: 0,
    entries_inserted: 0,
    entries_skipped: 0,
    entries_failed: 0,
  };
}

/**
 * Create a fresh run accumulator for tracking counters during execution
 */
export function createRunAccumulator(): RunAccumulator {
  return { counters: createCycleCounters(), errorCode: null };
}

/**
 * Execute a function within a run lifecycle
 *
 * Guarantees the run is finalized regardless of success or failure.
 * On success: status = "success"
 * On error: status = "failure", then rethrows the error
 *
 * **Counter management:**
 * - `fn` receives the caller's mutable accumulator and updates its counters
 *   as the cycle progresses.
 * - Counters are persisted in the `finally` block, so a cycle aborted halfway
 *   still records how far it got.
 *
 * @param fn - Async function to execute, receives (runId, acc)
 * @returns The result of fn
 */
export async function withRun<T>(
  db: Db,
  streamKey: string,
  acc: RunAccumulator,
  fn: (runId: number, acc: RunAccumulator) => Promise<T>,
): Promise<T> {
  const runId = startRun(db, streamKey);
  let succeeded = false;

  try {
    const result = await fn(runId, acc);
    succeeded = true;
    return result;
  } finally {
    finishRun(db, runId, succeeded ? "success" : "failure", acc);
  }
}
