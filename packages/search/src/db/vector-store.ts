/**
 * VectorStore: shared interface for embedding persistence.
 *
 * Records are keyed by (entityType, entityId, model); a later store
 * overwrites. Stores that cannot rank by similarity declare
 * `supportsSearch = false` and reject `search` with NotSupportedError.
 */

import { NotSupportedError } from '@scriptdex/core';
import type { EntityId, Metadata, VectorSearchHit } from '@scriptdex/core';
import type { SimilarityMetric } from '../lib/embeddings/similarity.js';

export interface VectorSearchOptions {
  /** Minimum similarity score to include (default: 0.0) */
  threshold?: number;
  /** Equality filter on stored metadata keys */
  filter?: Metadata;
  /** Scoring metric (default: the store's, usually cosine) */
  metric?: SimilarityMetric;
}

export interface VectorStore {
  readonly supportsSearch: boolean;

  store(entityType: string, entityId: EntityId, vector: Float32Array, model: string, metadata?: Metadata): Promise<void>;

  retrieve(entityType: string, entityId: EntityId, model: string): Promise<Float32Array | null>;

  search(
    queryVector: Float32Array,
    entityType: string,
    model: string,
    limit: number,
    options?: VectorSearchOptions,
  ): Promise<VectorSearchHit[]>;

  /** Without `model`, removes the entity under every model. Resolves true if anything was removed. */
  delete(entityType: string, entityId: EntityId, model?: string): Promise<boolean>;

  exists(entityType: string, entityId: EntityId, model: string): Promise<boolean>;
}

/**
 * Base for stores without similarity search.
 */
export abstract class BlobVectorStore implements VectorStore {
  readonly supportsSearch: boolean = false;

  abstract store(
    entityType: string,
    entityId: EntityId,
    vector: Float32Array,
    model: string,
    metadata?: Metadata,
  ): Promise<void>;
  abstract retrieve(entityType: string, entityId: EntityId, model: string): Promise<Float32Array | null>;
  abstract delete(entityType: string, entityId: EntityId, model?: string): Promise<boolean>;
  abstract exists(entityType: string, entityId: EntityId, model: string): Promise<boolean>;

  async search(
    _queryVector: Float32Array,
    _entityType: string,
    _model: string,
    _limit: number,
    _options?: VectorSearchOptions,
  ): Promise<VectorSearchHit[]> {
    throw new NotSupportedError(`${this.constructor.name} does not support similarity search`);
  }
}
