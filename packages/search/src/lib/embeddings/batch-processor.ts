/**
 * Batch embedding generation with per-item failure isolation.
 *
 * Items are grouped into sub-batches, each sent as one `embed` call;
 * up to `maxConcurrent` sub-batches are in flight at once. When a
 * sub-batch call fails, its items are retried one by one so a single
 * bad input never fails its siblings.
 */

import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_CHUNK_OVERLAP,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_MAX_CONCURRENT,
  GenerationError,
  getErrorMessage,
} from '@scriptdex/core';
import type { EmbeddingClient, EmbeddingResponse, Metadata } from '@scriptdex/core';
import { withRetry } from '../retry.js';
import { isRetryableEmbeddingError } from './openai.js';
import { createLogger } from '../logger.js';

const log = createLogger('BatchProcessor');

export interface BatchItem {
  id: string;
  text: string;
  metadata?: Metadata;
}

export type BatchResult =
  | { id: string; embedding: Float32Array; error?: undefined; metadata?: Metadata }
  | { id: string; embedding: null; error: string; metadata?: Metadata };

export interface BatchProcessorOptions {
  batchSize?: number;
  maxConcurrent?: number;
  /** Attempts per item in the one-by-one fallback (default 3) */
  retryAttempts?: number;
  /** Base backoff delay in ms (default 1000) */
  retryDelayMs?: number;
}

const NO_EMBEDDING = 'No embedding in response';

function success(item: BatchItem, values: number[]): BatchResult {
  return { id: item.id, embedding: new Float32Array(values), metadata: item.metadata };
}

function failure(item: BatchItem, error: string): BatchResult {
  return { id: item.id, embedding: null, error, metadata: item.metadata };
}

/** Embedding for input position `i`, honouring `index` when the provider sets it. */
function embeddingAt(response: EmbeddingResponse, i: number): number[] | undefined {
  const byIndex = response.data.find((d) => d.index === i);
  const entry = byIndex ?? (response.data.every((d) => d.index === undefined) ? response.data[i] : undefined);
  return entry && entry.embedding.length > 0 ? entry.embedding : undefined;
}

export class BatchProcessor {
  readonly batchSize: number;
  readonly maxConcurrent: number;
  readonly retryAttempts: number;
  readonly retryDelayMs: number;

  constructor(
    protected readonly client: EmbeddingClient,
    options: BatchProcessorOptions = {},
  ) {
    this.batchSize = Math.max(1, options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? DEFAULT_MAX_CONCURRENT);
    this.retryAttempts = Math.max(1, options.retryAttempts ?? 3);
    this.retryDelayMs = options.retryDelayMs ?? 1000;
  }

  /**
   * Generate embeddings for every item. Results come back in input order.
   */
  async processBatch(items: BatchItem[], model: string, dimensions?: number): Promise<BatchResult[]> {
    const batches: BatchItem[][] = [];
    for (let i = 0; i < items.length; i += this.batchSize) {
      batches.push(items.slice(i, i + this.batchSize));
    }

    const results: BatchResult[] = [];
    for (let i = 0; i < batches.length; i += this.maxConcurrent) {
      const wave = batches.slice(i, i + this.maxConcurrent);
      const waveResults = await Promise.all(wave.map((batch) => this.processSubBatch(batch, model, dimensions)));
      for (const batchResults of waveResults) results.push(...batchResults);
    }

    const failed = results.filter((r) => r.embedding === null).length;
    if (failed > 0) {
      log.warn(`${failed}/${items.length} items failed to embed`, { model });
    }
    return results;
  }

  /**
   * Consume items as they arrive, processing them `batchSize` at a time.
   */
  async *processStream(
    items: AsyncIterable<BatchItem>,
    model: string,
    dimensions?: number,
    onProgress?: (processed: number) => void,
  ): AsyncGenerator<BatchResult> {
    let pending: BatchItem[] = [];
    let processed = 0;
    for await (const item of items) {
      pending.push(item);
      if (pending.length >= this.batchSize) {
        const results = await this.processBatch(pending, model, dimensions);
        pending = [];
        for (const result of results) {
          yield result;
          processed++;
        }
        onProgress?.(processed);
      }
    }
    if (pending.length > 0) {
      for (const result of await this.processBatch(pending, model, dimensions)) {
        yield result;
        processed++;
      }
      onProgress?.(processed);
    }
  }

  /** Rough token estimate: ~4 characters per token. */
  estimateTokens(text: string): number {
    return Math.floor(text.length / 4);
  }

  /**
   * Group items so each batch stays under `maxTokensPerBatch` estimated
   * tokens and `batchSize` items. An oversized item gets a batch of its own.
   */
  planBatches(items: BatchItem[], maxTokensPerBatch = 8000): BatchItem[][] {
    const batches: BatchItem[][] = [];
    let current: BatchItem[] = [];
    let tokens = 0;

    for (const item of items) {
      const itemTokens = this.estimateTokens(item.text);
      if (current.length > 0 && tokens + itemTokens > maxTokensPerBatch) {
        batches.push(current);
        current = [];
        tokens = 0;
      }
      current.push(item);
      tokens += itemTokens;
      if (current.length >= this.batchSize) {
        batches.push(current);
        current = [];
        tokens = 0;
      }
    }
    if (current.length > 0) batches.push(current);
    return batches;
  }

  private async processSubBatch(batch: BatchItem[], model: string, dimensions?: number): Promise<BatchResult[]> {
    if (batch.length === 1) {
      return [await this.processSingleWithRetry(batch[0], model, dimensions)];
    }

    let response: EmbeddingResponse;
    try {
      response = await this.client.embed({ model, input: batch.map((item) => item.text), dimensions });
    } catch (err) {
      log.warn(`Sub-batch of ${batch.length} failed, retrying items individually`, {
        error: getErrorMessage(err),
      });
      const results: BatchResult[] = [];
      for (const item of batch) {
        results.push(await this.processSingleWithRetry(item, model, dimensions));
      }
      return results;
    }

    return batch.map((item, i) => {
      const embedding = embeddingAt(response, i);
      return embedding ? success(item, embedding) : failure(item, NO_EMBEDDING);
    });
  }

  protected async processSingleWithRetry(item: BatchItem, model: string, dimensions?: number): Promise<BatchResult> {
    try {
      const embedding = await withRetry(
        async () => {
          const response = await this.client.embed({ model, input: item.text, dimensions });
          const values = embeddingAt(response, 0);
          if (!values) {
            throw new GenerationError(NO_EMBEDDING, { model, itemId: item.id, retryable: false });
          }
          return values;
        },
        {
          attempts: this.retryAttempts,
          baseDelayMs: this.retryDelayMs,
          isRetryable: isRetryableEmbeddingError,
          label: item.id,
        },
      );
      return success(item, embedding);
    } catch (err) {
      return failure(item, getErrorMessage(err));
    }
  }
}

export interface ChunkedBatchProcessorOptions extends BatchProcessorOptions {
  /** Maximum chunk length in characters (default 1000) */
  chunkSize?: number;
  /** Characters shared by consecutive chunks (default 200) */
  chunkOverlap?: number;
}

const SENTENCE_BREAKS = ['.', '!', '?', '\n\n'];

/**
 * Splits long texts into overlapping windows and embeds each window.
 * Chunk embeddings are returned as-is; nothing here pools them.
 */
export class ChunkedBatchProcessor extends BatchProcessor {
  readonly chunkSize: number;
  readonly chunkOverlap: number;

  constructor(client: EmbeddingClient, options: ChunkedBatchProcessorOptions = {}) {
    super(client, options);
    this.chunkSize = Math.max(1, options.chunkSize ?? DEFAULT_CHUNK_SIZE);
    this.chunkOverlap = Math.max(0, options.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP);
  }

  /**
   * Windows of at most `chunkSize` characters. A window ends early at the
   * last sentence break in its second half, when there is one.
   */
  chunkText(text: string): string[] {
    if (text.length <= this.chunkSize) return [text];

    const chunks: string[] = [];
    let start = 0;
    while (start < text.length) {
      let end = Math.min(start + this.chunkSize, text.length);

      if (end < text.length) {
        const minBreak = start + Math.floor(this.chunkSize / 2);
        for (const sep of SENTENCE_BREAKS) {
          const at = text.lastIndexOf(sep, end - sep.length);
          if (at > minBreak) {
            end = at + sep.length;
            break;
          }
        }
      }

      chunks.push(text.slice(start, end));
      if (end >= text.length) break;
      start = Math.max(end - this.chunkOverlap, start + 1);
    }
    return chunks;
  }

  /**
   * Embed every item, splitting long ones. Chunk results carry ids
   * `{id}_chunk_{i}` and `parent_id` / `chunk_index` metadata.
   */
  async processWithChunking(items: BatchItem[], model: string, dimensions?: number): Promise<BatchResult[]> {
    const expanded: BatchItem[] = [];
    for (const item of items) {
      const chunks = this.chunkText(item.text);
      if (chunks.length === 1) {
        expanded.push(item);
        continue;
      }
      chunks.forEach((chunk, i) => {
        expanded.push({
          id: `${item.id}_chunk_${i}`,
          text: chunk,
          metadata: { ...item.metadata, parent_id: item.id, chunk_index: i, chunk_count: chunks.length },
        });
      });
    }
    return this.processBatch(expanded, model, dimensions);
  }
}
