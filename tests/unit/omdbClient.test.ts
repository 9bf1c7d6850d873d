/**
 * Unit tests for the OMDb client and its mappers
 *
 * HTTP replaced by the mock harness; no network
 */

import { describe, it, expect, beforeEach } from "vitest";
import { OmdbClient } from "@/clients/omdb";
import { mapOmdbTitleResponse, parseOmdbTitleResponse } from "@/clients/omdb/mappers";
import { ExternalLookupFailure } from "@/errors";
import { createMockHttp, type MockHttp } from "../helpers/mockHttp";

const OMDB_URL = "https://www.omdbapi.com/";

describe("OMDb mappers", () => {
  it("should map a found title to lookup fields", () => {
    const response = parseOmdbTitleResponse({
      Response: "True",
      Title: "Heat",
      Year: "1995",
      Genre: "Crime, Drama",
      Director: "Michael Mann",
      Plot: "A heist crew and a detective.",
      imdbID: "tt-ignored",
    });

    expect(mapOmdbTitleResponse(response)).toEqual({
      found: true,
      fields: {
        title: "Heat",
        year: "1995",
        genre: "Crime, Drama",
        director: "Michael Mann",
        plot: "A heist crew and a detective.",
      },
    });
  });

  it("should map Response False to not found with the service reason", () => {
    const response = parseOmdbTitleResponse({
      Response: "False",
      Error: "Movie not found!",
    });

    expect(mapOmdbTitleResponse(response)).toEqual({
      found: false,
      reason: "Movie not found!",
    });
  });

  it("should drop empty fields", () => {
    const response = parseOmdbTitleResponse({
      Response: "True",
      Title: "Heat",
      Plot: "  ",
    });

    expect(mapOmdbTitleResponse(response)).toEqual({
      found: true,
      fields: {
        title: "Heat",
        year: undefined,
        genre: undefined,
        director: undefined,
        plot: undefined,
      },
    });
  });

  it("should reject a body without the Response flag", () => {
    expect(() => parseOmdbTitleResponse("<html>")).toThrow(ExternalLookupFailure);
    expect(() => parseOmdbTitleResponse({ Title: "Heat" })).toThrow(
      "Malformed OMDb response body",
    );
  });
});

describe("OmdbClient", () => {
  let mock: MockHttp;
  let client: OmdbClient;

  beforeEach(() => {
    mock = createMockHttp();
    client = new OmdbClient({ apiKey: "test-secret", httpRequest: mock.request });
  });

  it("should require an API key", () => {
    expect(() => new OmdbClient({ apiKey: "" })).toThrow(
      "OMDb API key missing: set OMDB_API_KEY",
    );
  });

  it("should query by title and year with a single attempt", async () => {
    mock.on("GET", OMDB_URL, {
      Response: "True",
      Title: "The Matrix",
      Year: "1999",
    });

    const result = await client.lookup({ title: "The Matrix", year: "1999" });

    expect(result).toEqual({
      found: true,
      fields: {
        title: "The Matrix",
        year: "1999",
        genre: undefined,
        director: undefined,
        plot: undefined,
      },
    });

    const [request] = mock.getRecordedRequests();
    expect(request.query).toEqual({
      t: "The Matrix",
      apikey: "test-secret",
      y: "1999",
    });
    expect(request.timeoutMs).toBe(10_000);
  });

  it("should omit the year parameter when the key has none", async () => {
    mock.on("GET", OMDB_URL, { Response: "False", Error: "Movie not found!" });

    const result = await client.lookup({ title: "Heat" });

    expect(result).toEqual({ found: false, reason: "Movie not found!" });
    expect(mock.getRecordedRequests()[0].query).toEqual({
      t: "Heat",
      apikey: "test-secret",
    });
  });

  it("should turn an HTTP error into ExternalLookupFailure without the key", async () => {
    mock.onResponse("GET", OMDB_URL, {
      status: 503,
      body: "Service Unavailable",
    });

    const error = await client.lookup({ title: "Heat" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalLookupFailure);
    expect(error).toMatchObject({
      message: "OMDb request failed with HTTP 503",
      status: 503,
    });
  });

  it("should turn a timeout into ExternalLookupFailure with no status", async () => {
    mock.onCustom("GET", OMDB_URL, async () => {
      const timeout = new Error("The operation was aborted");
      timeout.name = "AbortError";
      throw timeout;
    });

    const error = await client.lookup({ title: "Heat" }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ExternalLookupFailure);
    expect(error).toMatchObject({
      message: "OMDb request failed: AbortError",
      status: null,
    });
  });
});
