/**
 * SqliteVectorStore: searchable embedding storage in the relational DB.
 *
 * Vectors are codec-encoded BLOBs; similarity is computed in JS
 * (SQLite has no vector ops). Structural decode errors propagate.
 */

import { eq, and, sql } from 'drizzle-orm';
import type { EntityId, Metadata, VectorSearchHit } from '@scriptdex/core';
import type { SqliteDb } from './index.js';
import type { VectorStore, VectorSearchOptions } from './vector-store.js';
import { embeddings } from './schema.sqlite.js';
import { serializeEmbedding, deserializeEmbedding } from '../lib/embeddings/codec.js';
import { SimilarityCalculator } from '../lib/embeddings/similarity.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('SqliteVectorStore');

/** Maximum candidates loaded into memory for similarity search */
const MAX_CANDIDATES = 10_000;

function parseMetadata(raw: string | null): Metadata {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    log.warn('Ignoring malformed embedding metadata');
  }
  return {};
}

function matchesFilter(metadata: Metadata, filter: Metadata | undefined): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([key, expected]) => {
    const actual = metadata[key];
    if (actual === expected) return true;
    return typeof expected === 'object' && expected !== null && JSON.stringify(actual) === JSON.stringify(expected);
  });
}

export class SqliteVectorStore implements VectorStore {
  readonly supportsSearch = true;

  private readonly calculator: SimilarityCalculator;

  constructor(
    private readonly db: SqliteDb,
    calculator: SimilarityCalculator = new SimilarityCalculator('cosine'),
  ) {
    this.calculator = calculator;
  }

  /**
   * Insert or overwrite the embedding for (entityType, entityId, model).
   */
  async store(
    entityType: string,
    entityId: EntityId,
    vector: Float32Array,
    model: string,
    metadata?: Metadata,
  ): Promise<void> {
    const blob = serializeEmbedding(vector);
    const meta = metadata ? JSON.stringify(metadata) : null;
    const now = new Date().toISOString();

    this.db
      .insert(embeddings)
      .values({
        entityType,
        entityId,
        embeddingModel: model,
        embedding: blob,
        dimensions: vector.length,
        metadata: meta,
        createdAt: now,
      })
      .onConflictDoUpdate({
        target: [embeddings.entityType, embeddings.entityId, embeddings.embeddingModel],
        set: { embedding: blob, dimensions: vector.length, metadata: meta, createdAt: now },
      })
      .run();
  }

  async retrieve(entityType: string, entityId: EntityId, model: string): Promise<Float32Array | null> {
    const row = this.db
      .select({ embedding: embeddings.embedding })
      .from(embeddings)
      .where(this.keyCondition(entityType, entityId, model))
      .get();

    return row ? deserializeEmbedding(row.embedding) : null;
  }

  /**
   * Load candidates for (entityType, model), filter by metadata equality,
   * score by cosine similarity, keep scores ≥ threshold, return top N.
   */
  async search(
    queryVector: Float32Array,
    entityType: string,
    model: string,
    limit: number,
    options: VectorSearchOptions = {},
  ): Promise<VectorSearchHit[]> {
    const { threshold = 0.0, filter, metric } = options;

    const rows = this.db
      .select({ entityId: embeddings.entityId, embedding: embeddings.embedding, metadata: embeddings.metadata })
      .from(embeddings)
      .where(and(eq(embeddings.entityType, entityType), eq(embeddings.embeddingModel, model)))
      .limit(MAX_CANDIDATES)
      .all();

    if (rows.length >= MAX_CANDIDATES) {
      log.warn(
        `search hit MAX_CANDIDATES limit (${MAX_CANDIDATES}) ` +
          `for type=${entityType} model=${model}. Results may be incomplete.`,
      );
    }

    const metadataById = new Map<EntityId, Metadata>();
    const candidates: Array<{ id: EntityId; vector: Float32Array }> = [];
    for (const row of rows) {
      const metadata = parseMetadata(row.metadata);
      if (!matchesFilter(metadata, filter)) continue;
      metadataById.set(row.entityId, metadata);
      candidates.push({ id: row.entityId, vector: deserializeEmbedding(row.embedding) });
    }

    return this.calculator
      .findMostSimilar(queryVector, candidates, { topK: limit, threshold, metric })
      .map(({ id, score }) => ({ entityId: id, score, metadata: metadataById.get(id) ?? {} }));
  }

  async delete(entityType: string, entityId: EntityId, model?: string): Promise<boolean> {
    const condition =
      model === undefined
        ? and(eq(embeddings.entityType, entityType), eq(embeddings.entityId, entityId))
        : this.keyCondition(entityType, entityId, model);

    const result = this.db.delete(embeddings).where(condition).run();
    return result.changes > 0;
  }

  async exists(entityType: string, entityId: EntityId, model: string): Promise<boolean> {
    const row = this.db
      .select({ id: embeddings.id })
      .from(embeddings)
      .where(this.keyCondition(entityType, entityId, model))
      .get();
    return row !== undefined;
  }

  /**
   * Count stored embeddings, optionally narrowed by entity type and model.
   */
  async count(entityType?: string, model?: string): Promise<number> {
    const conditions = [];
    if (entityType !== undefined) conditions.push(eq(embeddings.entityType, entityType));
    if (model !== undefined) conditions.push(eq(embeddings.embeddingModel, model));

    const result = this.db
      .select({ count: sql<number>`COUNT(*)` })
      .from(embeddings)
      .where(conditions.length > 0 ? and(...conditions) : undefined)
      .get();

    return result?.count ?? 0;
  }

  private keyCondition(entityType: string, entityId: EntityId, model: string) {
    return and(
      eq(embeddings.entityType, entityType),
      eq(embeddings.entityId, entityId),
      eq(embeddings.embeddingModel, model),
    );
  }
}
