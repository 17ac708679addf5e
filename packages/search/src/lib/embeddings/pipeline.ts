/**
 * EmbeddingPipeline: preprocessing, cache lookup, batch generation and
 * soft dimension validation in front of an {@link EmbeddingClient}.
 */

import {
  ConfigurationError,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MAX_TEXT_LENGTH,
  GenerationError,
} from '@scriptdex/core';
import type { EmbeddingClient, EntityId, Metadata, SceneText } from '@scriptdex/core';
import { BatchProcessor } from './batch-processor.js';
import type { BatchItem, BatchProcessorOptions } from './batch-processor.js';
import { EmbeddingCache } from './cache.js';
import type { CacheStats, EmbeddingCacheOptions } from './cache.js';
import { DimensionRegistry } from './dimensions.js';
import { ScreenplayPreprocessor, StandardPreprocessor } from './preprocessing.js';
import type { PreprocessingStep, TextPreprocessor } from './preprocessing.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../logger.js';

const baseLog = createLogger('EmbeddingPipeline');

export interface EmbeddingPipelineOptions extends BatchProcessorOptions {
  client: EmbeddingClient;
  model?: string;
  /** Requested output dimensions; also the expected vector length when set */
  dimensions?: number;
  preprocessingSteps?: readonly PreprocessingStep[];
  /** Replaces the standard preprocessor built from `preprocessingSteps` */
  preprocessor?: TextPreprocessor;
  maxTextLength?: number;
  /** Default true */
  useCache?: boolean;
  cache?: EmbeddingCacheOptions;
  registry?: DimensionRegistry;
}

export interface PipelineStats {
  model: string;
  dimensions?: number;
  preprocessingSteps: PreprocessingStep[];
  maxTextLength: number;
  batchSize: number;
  cache?: CacheStats;
}

export interface SceneEmbedding {
  sceneId: EntityId;
  embedding: Float32Array | null;
}

export class EmbeddingPipeline {
  readonly model: string;
  readonly dimensions?: number;
  readonly maxTextLength: number;
  private readonly preprocessingSteps: PreprocessingStep[];
  private readonly preprocessor: TextPreprocessor;
  private readonly screenplayPreprocessor = new ScreenplayPreprocessor();
  private readonly cache: EmbeddingCache | null;
  private readonly registry: DimensionRegistry;
  private readonly batchProcessor: BatchProcessor;
  private readonly log: Logger;

  constructor(options: EmbeddingPipelineOptions) {
    this.model = options.model ?? DEFAULT_EMBEDDING_MODEL;
    this.log = baseLog.child({ model: this.model });
    this.dimensions = options.dimensions;
    this.maxTextLength = options.maxTextLength ?? DEFAULT_MAX_TEXT_LENGTH;
    this.preprocessingSteps = options.preprocessingSteps ? [...options.preprocessingSteps] : [];
    this.preprocessor =
      options.preprocessor ??
      new StandardPreprocessor({ steps: options.preprocessingSteps, maxTextLength: this.maxTextLength });
    this.cache = options.useCache === false ? null : new EmbeddingCache(options.cache);
    this.registry = options.registry ?? new DimensionRegistry();
    this.batchProcessor = new BatchProcessor(options.client, options);
  }

  /**
   * Embed one text. Throws {@link GenerationError} when the provider
   * returns nothing for it.
   */
  async generateEmbedding(text: string, metadata?: Metadata): Promise<Float32Array> {
    const processed = this.prepare(text, this.preprocessor);

    const cached = this.cache?.get(processed, this.model);
    if (cached) return cached;

    const [result] = await this.batchProcessor.processBatch(
      [{ id: 'single', text: processed, metadata }],
      this.model,
      this.dimensions,
    );

    if (!result || !result.embedding || result.embedding.length === 0) {
      const reason = result?.error ?? 'Unknown error';
      throw new GenerationError(`Failed to generate embedding: ${reason}`, { model: this.model });
    }

    this.checkDimensions(result.embedding);
    this.cache?.put(processed, this.model, result.embedding);
    return result.embedding;
  }

  /**
   * Embed many texts. The result is positional; failed items are `null`.
   * Identical texts (after preprocessing) are generated once.
   */
  async generateBatch(texts: string[], metadataList?: Array<Metadata | undefined>): Promise<Array<Float32Array | null>> {
    return this.generateBatchWith(this.preprocessor, texts, metadataList);
  }

  /**
   * Embed scenes as `Scene: {heading}\n\n{content}` through the
   * screenplay preprocessor.
   */
  async generateForScenes(scenes: SceneText[]): Promise<SceneEmbedding[]> {
    const texts = scenes.map((scene) => `Scene: ${scene.heading}\n\n${scene.content}`);
    const embeddings = await this.generateBatchWith(this.screenplayPreprocessor, texts);
    return scenes.map((scene, i) => ({ sceneId: scene.id, embedding: embeddings[i] ?? null }));
  }

  clearCache(): number {
    return this.cache ? this.cache.clear() : 0;
  }

  /** Read persisted cache entries; 0 when caching or persistence is off. */
  async loadCache(): Promise<number> {
    return this.cache ? this.cache.load() : 0;
  }

  /** Persist the cache; 0 when caching or persistence is off. */
  async saveCache(): Promise<number> {
    return this.cache ? this.cache.save() : 0;
  }

  getStats(): PipelineStats {
    const stats: PipelineStats = {
      model: this.model,
      dimensions: this.dimensions,
      preprocessingSteps: [...this.preprocessingSteps],
      maxTextLength: this.maxTextLength,
      batchSize: this.batchProcessor.batchSize,
    };
    if (this.cache) stats.cache = this.cache.getStats();
    return stats;
  }

  private async generateBatchWith(
    preprocessor: TextPreprocessor,
    texts: string[],
    metadataList?: Array<Metadata | undefined>,
  ): Promise<Array<Float32Array | null>> {
    if (metadataList && metadataList.length !== texts.length) {
      throw new ConfigurationError(
        `metadataList length (${metadataList.length}) does not match texts length (${texts.length})`,
      );
    }

    const results: Array<Float32Array | null> = new Array<Float32Array | null>(texts.length).fill(null);
    // processed text -> positions waiting for it
    const pending = new Map<string, number[]>();
    const items: BatchItem[] = [];

    texts.forEach((text, i) => {
      const processed = this.prepare(text, preprocessor);
      const cached = this.cache?.get(processed, this.model);
      if (cached) {
        results[i] = cached;
        return;
      }
      const positions = pending.get(processed);
      if (positions) {
        positions.push(i);
        return;
      }
      pending.set(processed, [i]);
      items.push({ id: String(items.length), text: processed, metadata: metadataList?.[i] });
    });

    if (items.length === 0) return results;

    const generated = await this.batchProcessor.processBatch(items, this.model, this.dimensions);

    items.forEach((item, k) => {
      const result = generated[k];
      const positions = pending.get(item.text) ?? [];
      if (!result || !result.embedding) {
        this.log.warn(`Failed to generate embedding for text ${positions.join(', ')}`, { error: result?.error });
        return;
      }
      const embedding = result.embedding;
      this.checkDimensions(embedding);
      this.cache?.put(item.text, this.model, embedding);
      positions.forEach((i, n) => {
        results[i] = n === 0 ? embedding : embedding.slice();
      });
    });

    return results;
  }

  private prepare(text: string, preprocessor: TextPreprocessor): string {
    const processed = preprocessor.process(text);
    return processed.length > this.maxTextLength ? `${processed.slice(0, this.maxTextLength)}...` : processed;
  }

  private checkDimensions(vector: Float32Array): void {
    const expected = this.dimensions ?? this.registry.getDimensions(this.model);
    if (expected !== undefined && vector.length !== expected) {
      this.log.warn(`Dimension mismatch: expected ${expected}, got ${vector.length}`);
    }
  }
}
