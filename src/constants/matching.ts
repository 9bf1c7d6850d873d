/**
 * Semantic matching defaults
 */

/**
 * Minimum cosine similarity for a match to be reported
 */
export const DEFAULT_SIMILARITY_FLOOR = 0.5;

/**
 * Texts per embedding request when filling the index
 */
export const DEFAULT_EMBEDDING_BATCH_SIZE = 32;
