/**
 * Ingestion pipeline constants
 */

/**
 * Upper bound for a server-advised rate-limit sleep
 *
 * Telegram flood waits can ask for hours; the cycle aborts after sleeping
 * and the scheduler decides when to try again.
 */
export const CHANNEL_MAX_RETRY_AFTER_MS = 5 * 60_000;

/**
 * Error codes persisted on ingestion_runs.error_code
 */
export const CYCLE_ERROR_CODES = {
  RATE_LIMIT: "RATE_LIMIT",
  DUPLICATE_CONSUMER: "DUPLICATE_CONSUMER",
  UNAUTHORIZED: "UNAUTHORIZED",
  CHANNEL_UNAVAILABLE: "CHANNEL_UNAVAILABLE",
  STORAGE: "STORAGE",
  UNKNOWN: "UNKNOWN",
} as const;
