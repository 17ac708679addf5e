/**
 * HybridVectorStore: fast primary plus optional durable secondary.
 *
 * Primary failures propagate; secondary failures are logged and
 * discarded. Misses on the primary are repaired from the secondary.
 */

import { getErrorMessage } from '@scriptdex/core';
import type { EntityId, Metadata, VectorSearchHit } from '@scriptdex/core';
import type { VectorStore, VectorSearchOptions } from './vector-store.js';
import { createLogger, type Logger } from '../lib/logger.js';

const log = createLogger('HybridVectorStore');

/**
 * Run `operation`, logging and discarding any failure.
 * Resolves true on success, false on failure; never rejects.
 */
export async function bestEffort(
  logger: Logger,
  description: string,
  operation: () => Promise<unknown>,
): Promise<boolean> {
  try {
    await operation();
    return true;
  } catch (err) {
    logger.warn(`${description} failed`, { error: getErrorMessage(err) });
    return false;
  }
}

export class HybridVectorStore implements VectorStore {
  constructor(
    private readonly primary: VectorStore,
    private readonly secondary: VectorStore | null = null,
  ) {}

  get supportsSearch(): boolean {
    return this.primary.supportsSearch;
  }

  async store(
    entityType: string,
    entityId: EntityId,
    vector: Float32Array,
    model: string,
    metadata?: Metadata,
  ): Promise<void> {
    await this.primary.store(entityType, entityId, vector, model, metadata);
    const secondary = this.secondary;
    if (secondary) {
      await bestEffort(log, `Secondary store of ${entityType}/${entityId}`, () =>
        secondary.store(entityType, entityId, vector, model, metadata),
      );
    }
  }

  async retrieve(entityType: string, entityId: EntityId, model: string): Promise<Float32Array | null> {
    const hit = await this.primary.retrieve(entityType, entityId, model);
    if (hit) return hit;
    if (!this.secondary) return null;

    const fallback = await this.secondary.retrieve(entityType, entityId, model);
    if (!fallback) return null;

    await bestEffort(log, `Write-through of ${entityType}/${entityId} to primary`, () =>
      this.primary.store(entityType, entityId, fallback, model),
    );
    return fallback;
  }

  search(
    queryVector: Float32Array,
    entityType: string,
    model: string,
    limit: number,
    options?: VectorSearchOptions,
  ): Promise<VectorSearchHit[]> {
    return this.primary.search(queryVector, entityType, model, limit, options);
  }

  async delete(entityType: string, entityId: EntityId, model?: string): Promise<boolean> {
    const removedPrimary = await this.primary.delete(entityType, entityId, model);
    let removedSecondary = false;
    const secondary = this.secondary;
    if (secondary) {
      await bestEffort(log, `Secondary delete of ${entityType}/${entityId}`, async () => {
        removedSecondary = await secondary.delete(entityType, entityId, model);
      });
    }
    return removedPrimary || removedSecondary;
  }

  async exists(entityType: string, entityId: EntityId, model: string): Promise<boolean> {
    if (await this.primary.exists(entityType, entityId, model)) return true;
    return this.secondary ? this.secondary.exists(entityType, entityId, model) : false;
  }
}
