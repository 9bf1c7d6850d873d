/**
 * HTTP client wrapper — JSON requests over native fetch
 *
 * One attempt per call, bounded by a timeout. Callers decide what a failure
 * means: the channel client defers to the next cycle, the metadata client
 * stores a sentinel.
 *
 * Responses are returned as `unknown`; each client narrows the payload it expects.
 */

import type { HttpQuery, HttpRequest } from "@/types";
import { HttpError } from "./httpError";
import {
  DEFAULT_HTTP_TIMEOUT_MS,
  DEFAULT_JSON_HEADERS,
  ERROR_BODY_SNIPPET_MAX_LENGTH,
} from "@/constants/clients/http";
import * as logger from "@/logger";

/**
 * Build URL with query parameters (arrays become repeated params)
 */
function buildUrl(baseUrl: string, query?: HttpQuery): string {
  if (!query || Object.keys(query).length === 0) {
    return baseUrl;
  }

  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(query)) {
    const items = Array.isArray(value) ? value : [value];
    for (const item of items) {
      url.searchParams.append(key, String(item));
    }
  }

  return url.toString();
}

/**
 * Leading part of an error body, kept on the HttpError
 */
async function readBodySnippet(response: Response): Promise<string | undefined> {
  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    logger.debug("Error body not readable", { error: logger.describeError(err) });
    return undefined;
  }

  if (!text) {
    return undefined;
  }
  return text.length > ERROR_BODY_SNIPPET_MAX_LENGTH
    ? `${text.substring(0, ERROR_BODY_SNIPPET_MAX_LENGTH)}...`
    : text;
}

function isJsonContentType(contentType: string | null): boolean {
  return (
    contentType !== null &&
    (contentType.includes("application/json") || contentType.includes("+json"))
  );
}

/**
 * Perform an HTTP request
 *
 * - Aborts after `timeoutMs` (the fetch rejects with an `AbortError`)
 * - Non-2xx statuses throw `HttpError` with status, headers and a body snippet
 * - JSON bodies are parsed; other content types come back as text; 204 as undefined
 *
 * @throws {HttpError} On non-2xx status codes
 * @throws {Error} On network errors or timeouts
 */
export async function httpRequest(req: HttpRequest): Promise<unknown> {
  const url = buildUrl(req.url, req.query);
  const controller = new AbortController();
  const timeoutId = setTimeout(
    () => controller.abort(),
    req.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS,
  );

  const headers: Record<string, string> =
    req.json !== undefined ? { ...DEFAULT_JSON_HEADERS } : {};
  Object.assign(headers, req.headers);

  try {
    const response = await fetch(url, {
      method: req.method,
      headers,
      body: req.json !== undefined ? JSON.stringify(req.json) : undefined,
      signal: controller.signal,
    });

    if (!response.ok) {
      throw new HttpError({
        status: response.status,
        statusText: response.statusText,
        url,
        bodySnippet: await readBodySnippet(response),
        headers: response.headers,
      });
    }

    if (response.status === 204) {
      return undefined;
    }

    const contentType = response.headers.get("content-type");
    if (!isJsonContentType(contentType)) {
      logger.warn("Non-JSON response received", {
        method: req.method,
        status: response.status,
        contentType: contentType ?? "none",
      });
      return await response.text();
    }

    try {
      return await response.json();
    } catch (parseError) {
      logger.warn("JSON parse failed", {
        method: req.method,
        status: response.status,
        error: logger.describeError(parseError),
      });
      return undefined;
    }
  } finally {
    clearTimeout(timeoutId);
  }
}
