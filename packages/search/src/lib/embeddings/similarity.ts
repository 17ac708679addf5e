/**
 * SimilarityCalculator: pluggable similarity metrics plus ranking helpers
 * over candidate embeddings.
 *
 * Distances (euclidean, manhattan) become scores through exp(-distance),
 * so every `score` is higher-is-better and a vector scores 1 against itself.
 */

import { getErrorMessage } from '@scriptdex/core';
import { cosineSimilarity, dotProduct, euclideanDistance, l2Norm, manhattanDistance } from './math.js';
import { createLogger } from '../logger.js';

const log = createLogger('SimilarityCalculator');

export type SimilarityMetric = 'cosine' | 'euclidean' | 'dot_product' | 'manhattan';

export const SIMILARITY_METRICS: readonly SimilarityMetric[] = ['cosine', 'euclidean', 'dot_product', 'manhattan'];

export interface SimilarityCandidate<Id> {
  id: Id;
  vector: ArrayLike<number>;
}

export interface SimilarityMatch<Id> {
  id: Id;
  score: number;
}

export interface RerankCandidate<Id, M> extends SimilarityCandidate<Id> {
  metadata: M;
}

export interface RerankedResult<Id, M> extends SimilarityMatch<Id> {
  metadata: M;
}

export interface FindMostSimilarOptions {
  /** Default 10 */
  topK?: number;
  /** Minimum score to keep */
  threshold?: number;
  metric?: SimilarityMetric;
}

function isDistance(metric: SimilarityMetric): boolean {
  return metric === 'euclidean' || metric === 'manhattan';
}

export class SimilarityCalculator {
  constructor(readonly metric: SimilarityMetric = 'cosine') {}

  /** Raw metric value: a similarity for cosine and dot product, a distance otherwise. */
  calculate(a: ArrayLike<number>, b: ArrayLike<number>, metric: SimilarityMetric = this.metric): number {
    switch (metric) {
      case 'cosine':
        return cosineSimilarity(a, b);
      case 'dot_product':
        return dotProduct(a, b);
      case 'euclidean':
        return euclideanDistance(a, b);
      case 'manhattan':
        return manhattanDistance(a, b);
    }
  }

  /** Higher-is-better score for any metric. */
  score(a: ArrayLike<number>, b: ArrayLike<number>, metric: SimilarityMetric = this.metric): number {
    const value = this.calculate(a, b, metric);
    return isDistance(metric) ? Math.exp(-value) : value;
  }

  /**
   * Best `topK` candidates by score, descending. Candidates whose
   * dimension differs from the query are skipped.
   */
  findMostSimilar<Id>(
    query: ArrayLike<number>,
    candidates: Iterable<SimilarityCandidate<Id>>,
    options: FindMostSimilarOptions = {},
  ): SimilarityMatch<Id>[] {
    const { topK = 10, threshold, metric = this.metric } = options;
    const matches: SimilarityMatch<Id>[] = [];

    for (const candidate of candidates) {
      if (candidate.vector.length !== query.length) {
        log.debug('Skipping candidate with mismatched dimension', {
          id: candidate.id,
          expected: query.length,
          actual: candidate.vector.length,
        });
        continue;
      }
      const score = this.score(query, candidate.vector, metric);
      if (threshold === undefined || score >= threshold) {
        matches.push({ id: candidate.id, score });
      }
    }

    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, topK);
  }

  /** Symmetric n×n score matrix with 1 on the diagonal. */
  batchSimilarity(vectors: ArrayLike<number>[], metric: SimilarityMetric = this.metric): number[][] {
    const n = vectors.length;
    const matrix = Array.from({ length: n }, () => new Array<number>(n).fill(0));
    for (let i = 0; i < n; i++) {
      matrix[i][i] = 1;
      for (let j = i + 1; j < n; j++) {
        const score = this.score(vectors[i], vectors[j], metric);
        matrix[i][j] = score;
        matrix[j][i] = score;
      }
    }
    return matrix;
  }

  /**
   * Re-score results against the query with `metric` and sort descending.
   * Results whose dimension differs from the query are dropped.
   */
  rerankResults<Id, M>(
    query: ArrayLike<number>,
    results: RerankCandidate<Id, M>[],
    metric: SimilarityMetric = this.metric,
  ): RerankedResult<Id, M>[] {
    const reranked: RerankedResult<Id, M>[] = [];
    for (const result of results) {
      try {
        reranked.push({ id: result.id, score: this.score(query, result.vector, metric), metadata: result.metadata });
      } catch (err) {
        log.warn('Dropping result from rerank', { id: result.id, error: getErrorMessage(err) });
      }
    }
    return reranked.sort((a, b) => b.score - a.score);
  }

  /** Unit-length copies; zero vectors are copied unchanged. */
  normalizeEmbeddings(vectors: ArrayLike<number>[]): Float32Array[] {
    return vectors.map((vector) => {
      const norm = l2Norm(vector);
      const out = Float32Array.from(vector);
      if (norm > 0) {
        for (let i = 0; i < out.length; i++) out[i] /= norm;
      }
      return out;
    });
  }

  /** Element-wise mean. */
  centroid(vectors: ArrayLike<number>[]): Float32Array {
    if (vectors.length === 0) {
      throw new Error('Cannot calculate centroid of empty list');
    }
    const dimension = vectors[0].length;
    const sum = new Float64Array(dimension);
    for (const vector of vectors) {
      if (vector.length !== dimension) {
        throw new Error(`Vector dimension mismatch: ${dimension} vs ${vector.length}`);
      }
      for (let i = 0; i < dimension; i++) sum[i] += vector[i];
    }
    return Float32Array.from(sum, (value) => value / vectors.length);
  }
}
