/**
 * Vector Math
 */

import { DimensionMismatchError, InvalidVectorError, type ErrorContext } from '../errors.js';

/**
 * Cosine similarity in [-1, 1]; 0 when either vector has no magnitude
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length, { operation: 'cosineSimilarity' });
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    const aVal = a[i] ?? 0;
    const bVal = b[i] ?? 0;
    dotProduct += aVal * bVal;
    normA += aVal * aVal;
    normB += bVal * bVal;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0 || !isFinite(magnitude)) return 0;

  return Math.max(-1, Math.min(1, dotProduct / magnitude));
}

/**
 * Cosine distance (1 - similarity), in [0, 2]
 */
export function cosineDistance(a: readonly number[], b: readonly number[]): number {
  return 1 - cosineSimilarity(a, b);
}

/**
 * Reject vectors of the wrong length, with non-finite entries or zero magnitude
 */
export function assertVector(vector: readonly number[], dimensions: number, context: ErrorContext): void {
  if (vector.length !== dimensions) {
    throw new DimensionMismatchError(dimensions, vector.length, context);
  }

  let norm = 0;
  for (const value of vector) {
    if (!Number.isFinite(value)) {
      throw new InvalidVectorError('contains a non-finite value', context);
    }
    norm += value * value;
  }

  if (norm === 0) {
    throw new InvalidVectorError('has zero magnitude', context);
  }
}

/**
 * Clamp a number into [0, 1]
 */
export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}
