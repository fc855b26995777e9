import { IncompatibleDimensionError } from "./errors.js";

/**
 * Cosine similarity of two equal-length vectors. Accepts Float32Array or
 * number[]. Zero-magnitude input scores 0.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length) throw new IncompatibleDimensionError(a.length, b.length);
  let dot = 0,
    normA = 0,
    normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  // sqrt(x * x) is exact, so a vector against itself scores exactly 1
  const denom = Math.sqrt(normA * normB);
  if (denom === 0) return 0;
  return Math.max(-1, Math.min(1, dot / denom));
}
