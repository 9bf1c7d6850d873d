/**
 * Metadata lookup type definitions
 */

export type MetadataLookupQuery = {
  title: string;
  year?: string;
};

/**
 * Descriptive fields returned by the lookup service
 *
 * Every field is optional; missing ones are rendered with a placeholder.
 */
export type MetadataFields = {
  title?: string;
  year?: string;
  genre?: string;
  director?: string;
  plot?: string;
};

export type MetadataLookupResult =
  | { found: true; fields: MetadataFields }
  | { found: false; reason: string };
