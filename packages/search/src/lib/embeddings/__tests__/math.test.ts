import { describe, it, expect } from 'vitest';
import { cosineSimilarity, dotProduct, euclideanDistance, l2Norm, manhattanDistance } from '../math.js';

describe('cosineSimilarity', () => {
  it('returns 1 for parallel vectors of different magnitude', () => {
    expect(cosineSimilarity(new Float32Array([1, 2, 3]), new Float32Array([2, 4, 6]))).toBeCloseTo(1, 5);
  });

  it('returns -1 for opposite vectors', () => {
    expect(cosineSimilarity([0, 3], [0, -1])).toBeCloseTo(-1, 5);
  });

  it('returns 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('accepts plain arrays and typed arrays together', () => {
    // [1,2,3]·[4,5,6] = 32; |a| = sqrt(14), |b| = sqrt(77)
    expect(cosineSimilarity([1, 2, 3], new Float32Array([4, 5, 6]))).toBeCloseTo(32 / Math.sqrt(14 * 77), 5);
  });

  it('returns 0 when a vector has zero norm', () => {
    expect(cosineSimilarity([0, 0, 0], [1, 2, 3])).toBe(0);
  });

  it('throws on dimension mismatch', () => {
    expect(() => cosineSimilarity([1, 2], [1, 2, 3])).toThrow('Vector dimension mismatch: 2 vs 3');
  });

  it('throws on zero-length vectors', () => {
    expect(() => cosineSimilarity([], [])).toThrow('zero-length');
  });
});

describe('distance and product helpers', () => {
  it('computes the dot product', () => {
    expect(dotProduct([1, 2, 3], new Float32Array([4, 5, 6]))).toBe(32);
  });

  it('computes euclidean and manhattan distances', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
    expect(manhattanDistance([0, 0], [3, -4])).toBe(7);
    expect(euclideanDistance([1, 2], [1, 2])).toBe(0);
  });

  it('computes the L2 norm', () => {
    expect(l2Norm([3, 4])).toBe(5);
    expect(l2Norm([])).toBe(0);
  });

  it('rejects mismatched dimensions', () => {
    expect(() => dotProduct([1], [1, 2])).toThrow('Vector dimension mismatch: 1 vs 2');
    expect(() => euclideanDistance([1], [1, 2])).toThrow('Vector dimension mismatch');
    expect(() => manhattanDistance([1, 2, 3], [1])).toThrow('Vector dimension mismatch: 3 vs 1');
  });
});
