export { EmbeddingIndex, embeddingTextFor } from "./embeddingIndex";
export type { EmbeddingIndexDeps } from "./embeddingIndex";
export { SemanticMatcher } from "./semanticMatcher";
export type { SemanticMatcherDeps } from "./semanticMatcher";
