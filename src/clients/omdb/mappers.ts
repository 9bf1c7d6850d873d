/**
 * OMDb response mappers
 */

import type { MetadataFields, MetadataLookupResult } from "@/types";
import type { OmdbTitleResponse } from "@/types/clients/omdb";
import { OMDB_RESPONSE_TRUE } from "@/constants/clients/omdb";
import { ExternalLookupFailure } from "@/errors";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/**
 * Narrow an untyped body to the OMDb title response shape
 *
 * @throws {ExternalLookupFailure} if the body lacks the Response flag
 */
export function parseOmdbTitleResponse(body: unknown): OmdbTitleResponse {
  if (!isRecord(body) || typeof body.Response !== "string") {
    throw new ExternalLookupFailure("Malformed OMDb response body");
  }

  return {
    Response: body.Response,
    Title: optionalString(body.Title),
    Year: optionalString(body.Year),
    Genre: optionalString(body.Genre),
    Director: optionalString(body.Director),
    Plot: optionalString(body.Plot),
    Error: optionalString(body.Error),
  };
}

/**
 * Map an OMDb title response to a lookup result
 */
export function mapOmdbTitleResponse(
  response: OmdbTitleResponse,
): MetadataLookupResult {
  if (response.Response !== OMDB_RESPONSE_TRUE) {
    return { found: false, reason: response.Error ?? "Unknown error" };
  }

  const fields: MetadataFields = {
    title: response.Title,
    year: response.Year,
    genre: response.Genre,
    director: response.Director,
    plot: response.Plot,
  };

  return { found: true, fields };
}
