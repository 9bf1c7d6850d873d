/**
 * Vector helpers for the embedding index
 */

/**
 * Cosine similarity of two equal-length vectors
 *
 * Returns 0 when either vector has zero magnitude.
 *
 * @throws Error if dimensions differ
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Pack a vector as little-endian float32 for BLOB storage
 */
export function encodeVector(vector: readonly number[]): Buffer {
  const buffer = Buffer.alloc(vector.length * 4);
  vector.forEach((value, i) => buffer.writeFloatLE(value, i * 4));
  return buffer;
}

/**
 * Inverse of encodeVector
 *
 * @throws Error if the buffer length is not a multiple of 4
 */
export function decodeVector(buffer: Buffer): number[] {
  if (buffer.length % 4 !== 0) {
    throw new Error(`Invalid vector blob length: ${buffer.length}`);
  }

  const vector: number[] = [];
  for (let offset = 0; offset < buffer.length; offset += 4) {
    vector.push(buffer.readFloatLE(offset));
  }
  return vector;
}
