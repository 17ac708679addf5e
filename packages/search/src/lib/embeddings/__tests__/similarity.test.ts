import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { SIMILARITY_METRICS, SimilarityCalculator } from '../similarity.js';

describe('SimilarityCalculator', () => {
  const calculator = new SimilarityCalculator();

  beforeEach(() => {
    vi.spyOn(process.stdout, 'write').mockReturnValue(true);
    vi.spyOn(process.stderr, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists every metric', () => {
    expect([...SIMILARITY_METRICS]).toEqual(['cosine', 'euclidean', 'dot_product', 'manhattan']);
  });

  it('returns the raw value of each metric', () => {
    expect(calculator.calculate([1, 0], [0, 1])).toBe(0);
    expect(calculator.calculate([1, 2], [3, 4], 'dot_product')).toBe(11);
    expect(calculator.calculate([0, 0], [3, 4], 'euclidean')).toBe(5);
    expect(calculator.calculate([0, 0], [3, 4], 'manhattan')).toBe(7);
  });

  it('turns distances into scores that are 1 for identical vectors', () => {
    expect(calculator.score([0, 0], [3, 4], 'euclidean')).toBeCloseTo(Math.exp(-5), 10);
    expect(calculator.score([0, 0], [3, 4], 'manhattan')).toBeCloseTo(Math.exp(-7), 10);
    expect(calculator.score([2, 5], [2, 5], 'euclidean')).toBe(1);
    expect(calculator.score([1, 2], [3, 4], 'dot_product')).toBe(11);
  });

  it('uses the metric it was built with by default', () => {
    expect(new SimilarityCalculator('manhattan').score([0, 0], [1, 1])).toBeCloseTo(Math.exp(-2), 10);
  });

  describe('findMostSimilar', () => {
    const candidates = [
      { id: 'c', vector: [0, 1] },
      { id: 'a', vector: [1, 0] },
      { id: 'd', vector: [1, 0, 0] },
      { id: 'e', vector: [-1, 0] },
      { id: 'b', vector: [1, 1] },
    ];

    it('ranks candidates descending and skips mismatched dimensions', () => {
      const matches = calculator.findMostSimilar([1, 0], candidates);

      expect(matches.map((m) => m.id)).toEqual(['a', 'b', 'c', 'e']);
      expect(matches[1].score).toBeCloseTo(Math.SQRT1_2, 6);
    });

    it('applies topK and threshold', () => {
      expect(calculator.findMostSimilar([1, 0], candidates, { topK: 1 }).map((m) => m.id)).toEqual(['a']);
      expect(calculator.findMostSimilar([1, 0], candidates, { threshold: 0 }).map((m) => m.id)).toEqual([
        'a',
        'b',
        'c',
      ]);
    });

    it('scores with a per-call metric', () => {
      const matches = calculator.findMostSimilar(
        [0, 0],
        [
          { id: 'far', vector: [3, 4] },
          { id: 'near', vector: [1, 0] },
        ],
        { metric: 'euclidean' },
      );

      expect(matches.map((m) => m.id)).toEqual(['near', 'far']);
      expect(matches[0].score).toBeCloseTo(Math.exp(-1), 10);
    });
  });

  it('builds a symmetric score matrix', () => {
    const matrix = calculator.batchSimilarity([
      [1, 0],
      [0, 1],
      [1, 1],
    ]);

    expect(matrix[0][0]).toBe(1);
    expect(matrix[1][1]).toBe(1);
    expect(matrix[0][1]).toBe(0);
    expect(matrix[1][0]).toBe(0);
    expect(matrix[0][2]).toBeCloseTo(Math.SQRT1_2, 6);
    expect(matrix[2][1]).toBe(matrix[1][2]);
  });

  it('reranks results and drops those it cannot score', () => {
    const reranked = calculator.rerankResults(
      [1, 0],
      [
        { id: 1, vector: [0, 1], metadata: 'orthogonal' },
        { id: 2, vector: [2, 0], metadata: 'parallel' },
        { id: 3, vector: [1, 2, 3], metadata: 'wrong size' },
      ],
    );

    expect(reranked.map((r) => [r.id, r.metadata])).toEqual([
      [2, 'parallel'],
      [1, 'orthogonal'],
    ]);
    expect(reranked[0].score).toBeCloseTo(1, 6);
  });

  it('normalizes to unit length without touching the input', () => {
    const input = [[3, 4], [0, 0]];
    const [unit, zero] = calculator.normalizeEmbeddings(input);

    expect(unit[0]).toBeCloseTo(0.6, 6);
    expect(unit[1]).toBeCloseTo(0.8, 6);
    expect(Array.from(zero)).toEqual([0, 0]);
    expect(input[0]).toEqual([3, 4]);
  });

  it('computes the element-wise mean', () => {
    expect(Array.from(calculator.centroid([[1, 2], [3, 4]]))).toEqual([2, 3]);
  });

  it('rejects an empty or ragged centroid input', () => {
    expect(() => calculator.centroid([])).toThrow('Cannot calculate centroid of empty list');
    expect(() => calculator.centroid([[1, 2], [1, 2, 3]])).toThrow('Vector dimension mismatch: 2 vs 3');
  });
});
