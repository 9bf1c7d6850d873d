/**
 * Metadata resolver — description text for a catalog entry
 *
 * Policy:
 * - a non-empty caption IS the description; the lookup service is not called
 * - otherwise one lookup by canonical key, no retries
 * - found: fixed multi-field summary
 * - not found: DETAILS_NOT_AVAILABLE
 * - transport failure: DETAILS_FETCH_ERROR
 *
 * A sentinel is stored like any description; nothing re-resolves it later
 * unless the message is ingested again.
 */

import type { MetadataLookupClient } from "@/interfaces";
import type { MetadataFields } from "@/types";
import {
  DETAILS_FETCH_ERROR,
  DETAILS_NOT_AVAILABLE,
  MISSING_FIELD_PLACEHOLDER,
} from "@/constants/catalog";
import { parseCanonicalKey } from "@/utils/text/canonicalKey";
import * as logger from "@/logger";

/**
 * Render lookup fields as the stored summary
 *
 * @example
 * formatMetadataSummary({ title: "Heat", year: "1995" })
 * // "Title: Heat\nYear: 1995\nGenre: N/A\nDirector: N/A\nPlot: N/A"
 */
export function formatMetadataSummary(fields: MetadataFields): string {
  const value = (field: string | undefined): string =>
    field ?? MISSING_FIELD_PLACEHOLDER;

  return [
    `Title: ${value(fields.title)}`,
    `Year: ${value(fields.year)}`,
    `Genre: ${value(fields.genre)}`,
    `Director: ${value(fields.director)}`,
    `Plot: ${value(fields.plot)}`,
  ].join("\n");
}

/**
 * True for the two sentinel descriptions
 */
export function isSentinelDescription(description: string): boolean {
  return (
    description === DETAILS_NOT_AVAILABLE || description === DETAILS_FETCH_ERROR
  );
}

export class MetadataResolver {
  constructor(private readonly lookupClient: MetadataLookupClient) {}

  async resolve(caption: string | undefined, canonicalKey: string): Promise<string> {
    if (caption !== undefined && caption.trim() !== "") {
      return caption;
    }

    const query = parseCanonicalKey(canonicalKey);

    try {
      const result = await this.lookupClient.lookup(query);
      if (result.found) {
        return formatMetadataSummary(result.fields);
      }

      logger.warn("Metadata lookup found no record", {
        canonicalKey,
        reason: result.reason,
      });
      return DETAILS_NOT_AVAILABLE;
    } catch (err) {
      logger.error("Metadata lookup failed", {
        canonicalKey,
        error: logger.describeError(err),
      });
      return DETAILS_FETCH_ERROR;
    }
  }
}
