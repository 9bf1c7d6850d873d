/**
 * Catalog constants — sentinel descriptions and metadata placeholders
 */

/**
 * Description stored when the lookup service has no record for the title
 */
export const DETAILS_NOT_AVAILABLE = "Movie details not available.";

/**
 * Description stored when the lookup call itself failed (timeout, DNS, non-2xx)
 *
 * Distinct from DETAILS_NOT_AVAILABLE so a later sweep can tell the two apart.
 */
export const DETAILS_FETCH_ERROR = "Error fetching movie details.";

/**
 * Placeholder for a missing field in a formatted summary
 */
export const MISSING_FIELD_PLACEHOLDER = "N/A";
