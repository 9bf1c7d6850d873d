export { HttpEmbeddingProvider, parseEmbeddingsResponse } from "./httpEmbeddingProvider";
export type { HttpEmbeddingProviderConfig } from "./httpEmbeddingProvider";
