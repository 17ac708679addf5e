/**
 * Vector math utilities for embeddings
 */

function checkDimensions(a: ArrayLike<number>, b: ArrayLike<number>): void {
  if (a.length !== b.length) {
    throw new Error(`Vector dimension mismatch: ${a.length} vs ${b.length}`);
  }
}

/**
 * Compute cosine similarity between two vectors.
 *
 * Returns a value between -1 and 1; 0 when either vector has zero norm.
 *
 * @throws Error if vectors have different lengths or are zero-length
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  checkDimensions(a, b);
  if (a.length === 0) {
    throw new Error('Cannot compute cosine similarity of zero-length vectors');
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  const denominator = Math.sqrt(normA) * Math.sqrt(normB);
  return denominator === 0 ? 0 : dot / denominator;
}

export function dotProduct(a: ArrayLike<number>, b: ArrayLike<number>): number {
  checkDimensions(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += a[i] * b[i];
  return sum;
}

/** L2 distance; lower is more similar. */
export function euclideanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  checkDimensions(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += (a[i] - b[i]) ** 2;
  return Math.sqrt(sum);
}

/** L1 distance; lower is more similar. */
export function manhattanDistance(a: ArrayLike<number>, b: ArrayLike<number>): number {
  checkDimensions(a, b);
  let sum = 0;
  for (let i = 0; i < a.length; i++) sum += Math.abs(a[i] - b[i]);
  return sum;
}

export function l2Norm(v: ArrayLike<number>): number {
  let sum = 0;
  for (let i = 0; i < v.length; i++) sum += v[i] * v[i];
  return Math.sqrt(sum);
}
