/**
 * Unit tests for the metadata resolver
 *
 * Lookup service replaced by an in-process fake
 */

import { describe, it, expect } from "vitest";
import { MetadataResolver, formatMetadataSummary, isSentinelDescription } from "@/metadata";
import {
  DETAILS_FETCH_ERROR,
  DETAILS_NOT_AVAILABLE,
} from "@/constants/catalog";
import { ExternalLookupFailure } from "@/errors";
import { FakeMetadataLookup } from "../helpers/fakeMetadata";

describe("formatMetadataSummary", () => {
  it("should render every field on its own line", () => {
    expect(
      formatMetadataSummary({
        title: "Heat",
        year: "1995",
        genre: "Crime, Drama",
        director: "Michael Mann",
        plot: "A crew of thieves and the detective chasing them.",
      }),
    ).toBe(
      "Title: Heat\n" +
        "Year: 1995\n" +
        "Genre: Crime, Drama\n" +
        "Director: Michael Mann\n" +
        "Plot: A crew of thieves and the detective chasing them.",
    );
  });

  it("should use N/A for missing fields", () => {
    expect(formatMetadataSummary({ title: "Heat", year: "1995" })).toBe(
      "Title: Heat\nYear: 1995\nGenre: N/A\nDirector: N/A\nPlot: N/A",
    );
  });
});

describe("isSentinelDescription", () => {
  it("should recognise both sentinels and nothing else", () => {
    expect(isSentinelDescription(DETAILS_NOT_AVAILABLE)).toBe(true);
    expect(isSentinelDescription(DETAILS_FETCH_ERROR)).toBe(true);
    expect(isSentinelDescription("Title: Heat")).toBe(false);
  });
});

describe("MetadataResolver", () => {
  it("should return a non-empty caption verbatim without a lookup", async () => {
    const lookup = new FakeMetadataLookup();
    const resolver = new MetadataResolver(lookup);

    const description = await resolver.resolve(
      "The Matrix, 1999!!",
      "The Matrix (1999)",
    );

    expect(description).toBe("The Matrix, 1999!!");
    expect(lookup.queries).toEqual([]);
  });

  it("should look up by title and year when there is no caption", async () => {
    const lookup = new FakeMetadataLookup().found("Heat", {
      title: "Heat",
      year: "1995",
      director: "Michael Mann",
    });
    const resolver = new MetadataResolver(lookup);

    const description = await resolver.resolve(undefined, "Heat (1995)");

    expect(lookup.queries).toEqual([{ title: "Heat", year: "1995" }]);
    expect(description).toBe(
      "Title: Heat\nYear: 1995\nGenre: N/A\nDirector: Michael Mann\nPlot: N/A",
    );
  });

  it("should treat a whitespace-only caption as missing", async () => {
    const lookup = new FakeMetadataLookup();
    const resolver = new MetadataResolver(lookup);

    await resolver.resolve("   ", "Heat");

    expect(lookup.queries).toEqual([{ title: "Heat" }]);
  });

  it("should store the not-available sentinel when nothing is found", async () => {
    const resolver = new MetadataResolver(new FakeMetadataLookup());

    expect(await resolver.resolve(undefined, "Nowhere Film (2031)")).toBe(
      DETAILS_NOT_AVAILABLE,
    );
  });

  it("should store the error sentinel when the lookup fails", async () => {
    const lookup = new FakeMetadataLookup().failing(
      "Unknown Film",
      new ExternalLookupFailure("OMDb request failed: TimeoutError"),
    );
    const resolver = new MetadataResolver(lookup);

    expect(await resolver.resolve(undefined, "Unknown Film (2020)")).toBe(
      DETAILS_FETCH_ERROR,
    );
    expect(lookup.queries).toHaveLength(1);
  });
});
