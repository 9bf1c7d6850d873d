/**
 * MetadataLookupClient interface — external descriptive metadata by title
 */

import type { MetadataLookupQuery, MetadataLookupResult } from "@/types";

export interface MetadataLookupClient {
  /**
   * Look up one title
   *
   * A well-formed negative answer is `{ found: false }`, not an error.
   *
   * @throws {ExternalLookupFailure} timeout, network failure, non-2xx or malformed body
   */
  lookup(query: MetadataLookupQuery): Promise<MetadataLookupResult>;
}
