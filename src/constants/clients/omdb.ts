/**
 * OMDb client constants
 */

export const OMDB_DEFAULT_BASE_URL = "https://www.omdbapi.com/";

export const OMDB_DEFAULT_TIMEOUT_MS = 10_000;

/**
 * Response flag OMDb uses for a found title
 */
export const OMDB_RESPONSE_TRUE = "True";
