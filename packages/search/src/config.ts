/**
 * Search configuration: reads from environment variables with defaults.
 */

import {
  ConfigurationError,
  DEFAULT_BATCH_SIZE,
  DEFAULT_CACHE_MAX_SIZE,
  DEFAULT_CACHE_TTL_SECONDS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MAX_CONCURRENT,
  DEFAULT_SEARCH_MIN_RESULTS,
  DEFAULT_SEARCH_RESULT_LIMIT_FACTOR,
  DEFAULT_SEARCH_SIMILARITY_THRESHOLD,
  DEFAULT_SEARCH_VECTOR_THRESHOLD,
} from '@scriptdex/core';
import { CACHE_STRATEGIES, type CacheStrategy } from './lib/embeddings/cache.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('Config');

export interface ScriptdexConfig {
  /** SQLite database path (default: './scriptdex.db') */
  dbPath: string;
  /** Root of the file-backed vector store (default: './.embeddings') */
  embeddingsDir: string;

  // ─── Embeddings ─────────────────────────────────────────
  embeddingModel: string;
  /** Requested output dimensions; provider default when unset */
  embeddingDimensions?: number;
  /** OpenAI-compatible endpoint base (default: https://api.openai.com/v1) */
  embeddingApiUrl: string;
  embeddingApiKey?: string;
  embeddingBatchSize: number;
  embeddingMaxConcurrent: number;
  embeddingCacheEnabled: boolean;
  embeddingCacheStrategy: CacheStrategy;
  embeddingCacheMaxSize: number;
  embeddingCacheTtlSeconds: number;
  /** Where the embedding cache is saved between runs; in-memory only when unset */
  embeddingCacheDir?: string;

  // ─── Search ─────────────────────────────────────────────
  /** Word count at which AUTO mode adds semantic search (default: 10) */
  searchVectorThreshold: number;
  /** Minimum cosine similarity for semantic hits (default: 0.3) */
  searchSimilarityThreshold: number;
  /** Fraction of the page size requested from semantic search (default: 0.5) */
  searchResultLimitFactor: number;
  /** Floor for the semantic search limit (default: 5) */
  searchMinResults: number;
}

function intEnv(name: string, fallback: number): number {
  const parsed = parseInt(process.env[name] ?? '', 10);
  return isNaN(parsed) ? fallback : parsed;
}

function floatEnv(name: string, fallback: number): number {
  const parsed = parseFloat(process.env[name] ?? '');
  return isNaN(parsed) ? fallback : parsed;
}

function cacheStrategy(): CacheStrategy {
  const raw = process.env['SCRIPTDEX_EMBEDDING_CACHE_STRATEGY'];
  if (!raw) return 'lru';
  const match = CACHE_STRATEGIES.find((s) => s === raw.toLowerCase());
  if (!match) {
    log.warn(`Unknown SCRIPTDEX_EMBEDDING_CACHE_STRATEGY '${raw}', using 'lru'`);
    return 'lru';
  }
  return match;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(): ScriptdexConfig {
  const dimensions = intEnv('SCRIPTDEX_EMBEDDING_DIMENSIONS', 0);
  return {
    dbPath: process.env['SCRIPTDEX_DB_PATH'] || './scriptdex.db',
    embeddingsDir: process.env['SCRIPTDEX_EMBEDDINGS_DIR'] || './.embeddings',

    embeddingModel: process.env['SCRIPTDEX_EMBEDDING_MODEL'] || DEFAULT_EMBEDDING_MODEL,
    embeddingDimensions: dimensions > 0 ? dimensions : undefined,
    embeddingApiUrl: process.env['SCRIPTDEX_EMBEDDING_API_URL'] || 'https://api.openai.com/v1',
    embeddingApiKey: process.env['SCRIPTDEX_EMBEDDING_API_KEY'] || process.env['OPENAI_API_KEY'] || undefined,
    embeddingBatchSize: intEnv('SCRIPTDEX_EMBEDDING_BATCH_SIZE', DEFAULT_BATCH_SIZE),
    embeddingMaxConcurrent: intEnv('SCRIPTDEX_EMBEDDING_MAX_CONCURRENT', DEFAULT_MAX_CONCURRENT),
    embeddingCacheEnabled: process.env['SCRIPTDEX_EMBEDDING_CACHE'] !== 'false',
    embeddingCacheStrategy: cacheStrategy(),
    embeddingCacheMaxSize: intEnv('SCRIPTDEX_EMBEDDING_CACHE_MAX_SIZE', DEFAULT_CACHE_MAX_SIZE),
    embeddingCacheTtlSeconds: intEnv('SCRIPTDEX_EMBEDDING_CACHE_TTL_SECONDS', DEFAULT_CACHE_TTL_SECONDS),
    embeddingCacheDir: process.env['SCRIPTDEX_EMBEDDING_CACHE_DIR'] || undefined,

    searchVectorThreshold: intEnv('SCRIPTDEX_SEARCH_VECTOR_THRESHOLD', DEFAULT_SEARCH_VECTOR_THRESHOLD),
    searchSimilarityThreshold: floatEnv('SCRIPTDEX_SEARCH_SIMILARITY_THRESHOLD', DEFAULT_SEARCH_SIMILARITY_THRESHOLD),
    searchResultLimitFactor: floatEnv('SCRIPTDEX_SEARCH_RESULT_LIMIT_FACTOR', DEFAULT_SEARCH_RESULT_LIMIT_FACTOR),
    searchMinResults: intEnv('SCRIPTDEX_SEARCH_MIN_RESULTS', DEFAULT_SEARCH_MIN_RESULTS),
  };
}

/**
 * Validate config at startup. Logs warnings and throws on fatal misconfigurations.
 */
export function validateConfig(config: ScriptdexConfig): void {
  if (!config.embeddingApiKey) {
    log.warn('No embedding API key set. Semantic search and indexing will fail until SCRIPTDEX_EMBEDDING_API_KEY is set.');
  }

  if (!(config.searchResultLimitFactor > 0 && config.searchResultLimitFactor <= 1)) {
    throw new ConfigurationError(
      `FATAL: SCRIPTDEX_SEARCH_RESULT_LIMIT_FACTOR must be in (0, 1], got ${config.searchResultLimitFactor}.`,
    );
  }

  if (config.searchSimilarityThreshold < 0 || config.searchSimilarityThreshold > 1) {
    throw new ConfigurationError(
      `FATAL: SCRIPTDEX_SEARCH_SIMILARITY_THRESHOLD must be in [0, 1], got ${config.searchSimilarityThreshold}.`,
    );
  }

  if (config.embeddingBatchSize < 1) {
    throw new ConfigurationError(`FATAL: SCRIPTDEX_EMBEDDING_BATCH_SIZE must be at least 1, got ${config.embeddingBatchSize}.`);
  }

  if (config.embeddingMaxConcurrent < 1) {
    throw new ConfigurationError(
      `FATAL: SCRIPTDEX_EMBEDDING_MAX_CONCURRENT must be at least 1, got ${config.embeddingMaxConcurrent}.`,
    );
  }
}
