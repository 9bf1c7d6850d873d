/**
 * Run lock constants
 */

/**
 * Prefix of the lock name; the channel stream key is appended
 */
export const RUN_LOCK_NAME_PREFIX = "ingestion:";

/**
 * Lock time-to-live in seconds
 *
 * A crashed consumer's lock can be taken over after this long. The pipeline
 * refreshes it after every consumed message, so it must exceed the longest
 * single step: one fetch, one lookup, or a rate-limit back-off.
 */
export const RUN_LOCK_TTL_SECONDS = 900;
