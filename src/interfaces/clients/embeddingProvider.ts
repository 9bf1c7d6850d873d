/**
 * EmbeddingProvider interface — sentence embeddings
 */

export interface EmbeddingProvider {
  /**
   * Model identifier; vectors from different models are never compared
   */
  readonly model: string;

  /**
   * Embed each text into a fixed-length vector, in input order
   *
   * Deterministic for identical input.
   */
  embed(texts: readonly string[]): Promise<number[][]>;
}
