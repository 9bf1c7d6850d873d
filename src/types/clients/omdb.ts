/**
 * OMDb API response shapes (subset used by the catalog)
 */

export type OmdbTitleResponse = {
  Response: string;
  Title?: string;
  Year?: string;
  Genre?: string;
  Director?: string;
  Plot?: string;
  Error?: string;
};
