/**
 * SemanticSearchAdapter: bridges the embedding pipeline and a searchable
 * vector store into the search engine, and indexes the entities it
 * searches over.
 */

import { SemanticSearchError, getErrorMessage } from '@scriptdex/core';
import type { EntityId, Metadata, SceneText, SearchQuery, SearchResult } from '@scriptdex/core';
import type { EmbeddingPipeline } from '../embeddings/pipeline.js';
import type { VectorStore } from '../../db/vector-store.js';
import { createLogger } from '../logger.js';

const log = createLogger('SemanticSearchAdapter');

export const SCENE_ENTITY = 'scene';
export const BIBLE_CHUNK_ENTITY = 'bible_chunk';

export interface IndexableScene extends SceneText {
  scriptId: EntityId;
  sceneNumber?: number;
  location?: string | null;
}

export interface IndexableBibleChunk {
  id: EntityId;
  scriptId: EntityId;
  bibleId: EntityId;
  bibleTitle?: string | null;
  heading?: string | null;
  level?: number | null;
  content: string;
}

export interface IndexReport {
  indexed: number;
  failed: number;
}

export interface SemanticEnhancement {
  results: SearchResult[];
  bibleResults: SearchResult[];
}

/** What the search engine needs from a semantic layer. */
export interface SemanticEnhancer {
  enhanceResults(query: SearchQuery, existing: SearchResult[], limit: number): Promise<SemanticEnhancement>;
}

export interface SemanticSearchAdapterOptions {
  pipeline: EmbeddingPipeline;
  store: VectorStore;
  /** Minimum cosine similarity for a hit (default 0.3) */
  similarityThreshold?: number;
}

/** Text a query is matched on semantically: dialogue, then action, then free text. */
export function semanticQueryText(query: SearchQuery): string | undefined {
  return query.dialogue ?? query.action ?? query.textQuery;
}

function str(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

function num(value: unknown): number | null {
  return typeof value === 'number' ? value : null;
}

function clampScore(score: number): number {
  return Math.max(0, Math.min(1, score));
}

export class SemanticSearchAdapter implements SemanticEnhancer {
  private readonly pipeline: EmbeddingPipeline;
  private readonly store: VectorStore;
  private readonly similarityThreshold: number;

  constructor(options: SemanticSearchAdapterOptions) {
    this.pipeline = options.pipeline;
    this.store = options.store;
    this.similarityThreshold = options.similarityThreshold ?? 0.3;
  }

  /**
   * Append up to `limit` semantically similar scenes not already in
   * `existing`; with `includeBible` or `onlyBible`, also return similar
   * bible chunks. Any failure is raised as {@link SemanticSearchError}.
   */
  async enhanceResults(query: SearchQuery, existing: SearchResult[], limit: number): Promise<SemanticEnhancement> {
    const text = semanticQueryText(query);
    if (!text) return { results: existing, bibleResults: [] };

    try {
      const vector = await this.pipeline.generateEmbedding(text);
      const model = this.pipeline.model;

      const sceneHits = await this.store.search(vector, SCENE_ENTITY, model, limit * 2, {
        threshold: this.similarityThreshold,
      });

      const bibleResults: SearchResult[] = [];
      if (query.includeBible || query.onlyBible) {
        const bibleHits = await this.store.search(vector, BIBLE_CHUNK_ENTITY, model, limit, {
          threshold: this.similarityThreshold,
        });
        for (const hit of bibleHits) bibleResults.push(this.toBibleResult(hit.entityId, hit.score, hit.metadata));
      }

      const seen = new Set(existing.filter((r) => r.type === 'scene').map((r) => r.id));
      const results = [...existing];
      let added = 0;
      for (const hit of sceneHits) {
        if (added >= limit) break;
        const id = String(hit.entityId);
        if (seen.has(id)) continue;
        seen.add(id);
        results.push(this.toSceneResult(hit.entityId, hit.score, hit.metadata));
        added++;
      }

      log.info(`Added ${added} semantic scene results and ${bibleResults.length} bible results`);
      return { results, bibleResults };
    } catch (err) {
      throw new SemanticSearchError(`Semantic search failed: ${getErrorMessage(err)}`, err);
    }
  }

  /** Embed and store scenes. Scenes whose generation failed are counted, not stored. */
  async indexScenes(scenes: IndexableScene[]): Promise<IndexReport> {
    const embeddings = await this.pipeline.generateForScenes(scenes);
    const report: IndexReport = { indexed: 0, failed: 0 };

    for (const [i, { sceneId, embedding }] of embeddings.entries()) {
      if (!embedding) {
        report.failed++;
        continue;
      }
      const scene = scenes[i];
      await this.store.store(SCENE_ENTITY, sceneId, embedding, this.pipeline.model, {
        script_id: scene.scriptId,
        scene_number: scene.sceneNumber ?? null,
        heading: scene.heading,
        location: scene.location ?? null,
        content: scene.content,
      });
      report.indexed++;
    }

    log.info(`Indexed ${report.indexed} scenes (${report.failed} failed)`);
    return report;
  }

  async indexBibleChunks(chunks: IndexableBibleChunk[]): Promise<IndexReport> {
    const texts = chunks.map((chunk) => (chunk.heading ? `${chunk.heading}\n\n${chunk.content}` : chunk.content));
    const embeddings = await this.pipeline.generateBatch(texts);
    const report: IndexReport = { indexed: 0, failed: 0 };

    for (const [i, chunk] of chunks.entries()) {
      const embedding = embeddings[i];
      if (!embedding) {
        report.failed++;
        continue;
      }
      await this.store.store(BIBLE_CHUNK_ENTITY, chunk.id, embedding, this.pipeline.model, {
        script_id: chunk.scriptId,
        bible_id: chunk.bibleId,
        bible_title: chunk.bibleTitle ?? null,
        heading: chunk.heading ?? null,
        level: chunk.level ?? null,
        content: chunk.content,
      });
      report.indexed++;
    }

    log.info(`Indexed ${report.indexed} bible chunks (${report.failed} failed)`);
    return report;
  }

  private toSceneResult(entityId: EntityId, score: number, stored: Metadata): SearchResult {
    return {
      type: 'scene',
      id: String(entityId),
      content: str(stored['content']) ?? '',
      score: clampScore(score),
      metadata: {
        script_id: num(stored['script_id']),
        scene_number: num(stored['scene_number']),
        scene_heading: str(stored['heading']),
        scene_location: str(stored['location']),
        match_type: 'semantic',
      },
      highlights: [],
    };
  }

  private toBibleResult(entityId: EntityId, score: number, stored: Metadata): SearchResult {
    const bibleTitle = str(stored['bible_title']);
    return {
      type: 'bible_chunk',
      id: String(entityId),
      content: str(stored['content']) ?? '',
      score: clampScore(score),
      metadata: {
        script_id: num(stored['script_id']),
        script_title: bibleTitle ?? 'Unknown',
        bible_id: num(stored['bible_id']),
        bible_title: bibleTitle,
        chunk_heading: str(stored['heading']),
        chunk_level: num(stored['level']) ?? 0,
        match_type: 'semantic',
      },
      highlights: [],
    };
  }
}
