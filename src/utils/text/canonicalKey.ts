/**
 * Canonical key derivation for catalog entries
 *
 * A caption like "The Matrix, 1999!!" becomes "The Matrix (1999)". The key is
 * the deduplication identity of a catalog entry, so the function must stay
 * deterministic: changing it re-keys future postings while stored keys stay
 * as they were.
 *
 * What this does NOT do:
 * - Case folding (keys keep the caption's casing)
 * - Diacritic removal or any language-specific processing
 * - Rejecting empty input; "" is a valid key and callers decide what to do
 */

import type { ParsedCanonicalKey } from "@/types";
import {
  CANONICAL_YEAR_SUFFIX_PATTERN,
  FILE_EXTENSION_PATTERN,
  NON_WORD_CHARACTER_PATTERN,
  WHITESPACE_RUN_PATTERN,
  YEAR_PATTERN,
} from "@/constants/canonicalization";

/**
 * Replace punctuation and symbols with spaces, collapse whitespace, trim
 */
export function cleanCaptionText(text: string): string {
  return text
    .replace(NON_WORD_CHARACTER_PATTERN, " ")
    .replace(WHITESPACE_RUN_PATTERN, " ")
    .trim();
}

function withYear(body: string, year: string): string {
  return body ? `${body} (${year})` : `(${year})`;
}

/**
 * Normalize a raw caption into a canonical catalog key.
 *
 * Steps:
 * 1. Non-word characters become spaces, whitespace runs collapse, ends trim
 * 2. The first 4-digit run is taken as the release year, removed from the
 *    body (that occurrence only) and appended as " (YYYY)"
 *
 * A caption already ending in "(YYYY)" keeps that year even when the body
 * holds other 4-digit runs, so normalizing a key again returns the same key.
 *
 * @example
 * normalizeCaption("The Matrix, 1999!!") // "The Matrix (1999)"
 * normalizeCaption("1917 - 2019")        // "2019 (1917)"
 * normalizeCaption("?!")                 // ""
 */
export function normalizeCaption(raw: string): string {
  const suffix = CANONICAL_YEAR_SUFFIX_PATTERN.exec(raw);
  if (suffix) {
    return withYear(cleanCaptionText(raw.slice(0, suffix.index)), suffix[1]);
  }

  const cleaned = cleanCaptionText(raw);
  const match = YEAR_PATTERN.exec(cleaned);
  if (!match) {
    return cleaned;
  }

  const year = match[0];
  const body = cleanCaptionText(
    cleaned.slice(0, match.index) + " " + cleaned.slice(match.index + year.length),
  );

  return withYear(body, year);
}

/**
 * Split a canonical key into title and year
 *
 * @example
 * parseCanonicalKey("The Matrix (1999)") // { title: "The Matrix", year: "1999" }
 * parseCanonicalKey("Heat")              // { title: "Heat" }
 */
export function parseCanonicalKey(key: string): ParsedCanonicalKey {
  const suffix = CANONICAL_YEAR_SUFFIX_PATTERN.exec(key);
  if (!suffix) {
    return { title: key.trim() };
  }

  return { title: key.slice(0, suffix.index).trim(), year: suffix[1] };
}

/**
 * Caption stand-in for an attachment posted without one
 *
 * @example
 * captionFromFileName("Unknown Film (2020).mkv") // "Unknown Film (2020)"
 */
export function captionFromFileName(fileName: string): string {
  return fileName.trim().replace(FILE_EXTENSION_PATTERN, "");
}
