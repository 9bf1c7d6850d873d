/**
 * Embedding provider constants
 */

export const EMBEDDING_DEFAULT_API_URL = "http://localhost:8080/v1";

/**
 * Same sentence-embedding model the catalog was first built with
 */
export const EMBEDDING_DEFAULT_MODEL = "all-MiniLM-L6-v2";

export const EMBEDDING_DEFAULT_TIMEOUT_MS = 15_000;

export const EMBEDDING_ENDPOINT_PATH = "/embeddings";
