/**
 * OmdbClient — metadata lookup against the OMDb API
 *
 * One request per lookup, bounded by a timeout: a failed call yields the
 * error sentinel for that entry instead of stalling the cycle.
 */

import type { MetadataLookupClient } from "@/interfaces";
import type {
  HttpQuery,
  HttpRequestFn,
  MetadataLookupQuery,
  MetadataLookupResult,
} from "@/types";
import { httpRequest as defaultHttpRequest, HttpError } from "@/clients/http";
import {
  OMDB_DEFAULT_BASE_URL,
  OMDB_DEFAULT_TIMEOUT_MS,
} from "@/constants/clients/omdb";
import { ExternalLookupFailure } from "@/errors";
import { mapOmdbTitleResponse, parseOmdbTitleResponse } from "./mappers";
import * as logger from "@/logger";

export interface OmdbClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /**
   * Optional HTTP request function (for testing/mocking)
   * Defaults to production httpRequest implementation
   */
  httpRequest?: HttpRequestFn;
}

export class OmdbClient implements MetadataLookupClient {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly httpRequest: HttpRequestFn;

  constructor(config: OmdbClientConfig) {
    if (!config.apiKey) {
      throw new Error("OMDb API key missing: set OMDB_API_KEY");
    }

    this.apiKey = config.apiKey;
    this.baseUrl = config.baseUrl ?? OMDB_DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? OMDB_DEFAULT_TIMEOUT_MS;
    this.httpRequest = config.httpRequest ?? defaultHttpRequest;
  }

  async lookup(query: MetadataLookupQuery): Promise<MetadataLookupResult> {
    const params: HttpQuery = { t: query.title, apikey: this.apiKey };
    if (query.year) {
      params.y = query.year;
    }

    let body: unknown;
    try {
      body = await this.httpRequest({
        method: "GET",
        url: this.baseUrl,
        query: params,
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      // HttpError messages embed the URL, which carries the API key
      if (err instanceof HttpError) {
        throw new ExternalLookupFailure(
          `OMDb request failed with HTTP ${err.status}`,
          err.status,
        );
      }
      throw new ExternalLookupFailure(
        `OMDb request failed: ${err instanceof Error ? err.name : String(err)}`,
      );
    }

    const result = mapOmdbTitleResponse(parseOmdbTitleResponse(body));
    logger.debug("OMDb lookup finished", {
      title: query.title,
      year: query.year,
      found: result.found,
    });
    return result;
  }
}
