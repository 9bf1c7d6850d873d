export { OmdbClient } from "./omdbClient";
export type { OmdbClientConfig } from "./omdbClient";
