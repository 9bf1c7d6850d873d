/**
 * HttpError class — structured error for HTTP failures
 *
 * Kept out of @/types, which holds shapes only.
 */

import type { HttpErrorDetails } from "@/types";

/**
 * Structured error class for HTTP failures
 * Contains status, URL, and optional response body snippet for debugging
 *
 * The message embeds the URL; callers whose URLs carry credentials must not
 * log it verbatim.
 */
export class HttpError extends Error {
  public readonly status: number;
  public readonly statusText: string;
  public readonly url: string;
  public readonly bodySnippet?: string;
  public readonly headers?: Headers;

  constructor(details: HttpErrorDetails) {
    super(
      `HTTP ${details.status} ${details.statusText} - ${details.url}${
        details.bodySnippet ? ` - ${details.bodySnippet}` : ""
      }`,
    );
    this.name = "HttpError";
    this.status = details.status;
    this.statusText = details.statusText;
    this.url = details.url;
    this.bodySnippet = details.bodySnippet;
    this.headers = details.headers;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, HttpError);
    }
  }
}

/**
 * Timeout or network failure (no HTTP response received)
 */
export function isTransportError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === "AbortError" ||
      err.name === "TimeoutError" ||
      err.name === "TypeError")
  );
}
