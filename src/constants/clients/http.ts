/**
 * HTTP client constants
 */

/**
 * Default request timeout (30 seconds); every outbound call is bounded
 */
export const DEFAULT_HTTP_TIMEOUT_MS = 30_000;

export const DEFAULT_JSON_HEADERS: Record<string, string> = {
  "Content-Type": "application/json",
  Accept: "application/json",
};

/**
 * Maximum length of the response body kept on an HttpError
 */
export const ERROR_BODY_SNIPPET_MAX_LENGTH = 200;
