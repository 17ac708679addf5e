/**
 * Wires configuration, storage, the embedding pipeline and the search
 * engine into one ready-to-use stack.
 */

import type { EmbeddingClient } from '@scriptdex/core';
import { getConfig, validateConfig, type ScriptdexConfig } from './config.js';
import { createDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { SqliteVectorStore } from './db/sqlite-vector-store.js';
import { FileVectorStore } from './db/file-vector-store.js';
import { HybridVectorStore } from './db/hybrid-vector-store.js';
import { EmbeddingPipeline } from './lib/embeddings/pipeline.js';
import { createOpenAIEmbeddingClient } from './lib/embeddings/openai.js';
import { SemanticSearchAdapter } from './lib/search/semantic-adapter.js';
import { SearchEngine } from './lib/search/engine.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('Scriptdex');

export interface SearchStack {
  engine: SearchEngine;
  /** Null when no embedding client could be configured */
  adapter: SemanticSearchAdapter | null;
  pipeline: EmbeddingPipeline | null;
  store: HybridVectorStore;
  /** Closes the read-write database handle behind the vector store */
  close(): void;
}

export interface SearchStackOptions {
  /** Replaces the OpenAI-compatible client built from the config */
  client?: EmbeddingClient;
}

/**
 * Build the search stack. Embeddings live in the SQLite `embeddings`
 * table with the file store under `embeddingsDir` as durable backup.
 */
export function createSearchStack(config: ScriptdexConfig = getConfig(), options: SearchStackOptions = {}): SearchStack {
  validateConfig(config);

  const db = createDb({ databasePath: config.dbPath });
  runMigrations(db);

  const store = new HybridVectorStore(new SqliteVectorStore(db), new FileVectorStore(config.embeddingsDir));

  const client =
    options.client ??
    (config.embeddingApiKey
      ? createOpenAIEmbeddingClient({ apiKey: config.embeddingApiKey, baseUrl: config.embeddingApiUrl })
      : null);

  let pipeline: EmbeddingPipeline | null = null;
  let adapter: SemanticSearchAdapter | null = null;
  if (client) {
    pipeline = new EmbeddingPipeline({
      client,
      model: config.embeddingModel,
      dimensions: config.embeddingDimensions,
      batchSize: config.embeddingBatchSize,
      maxConcurrent: config.embeddingMaxConcurrent,
      useCache: config.embeddingCacheEnabled,
      cache: {
        strategy: config.embeddingCacheStrategy,
        maxSize: config.embeddingCacheMaxSize,
        ttlSeconds: config.embeddingCacheTtlSeconds,
        directory: config.embeddingCacheDir,
      },
    });
    adapter = new SemanticSearchAdapter({
      pipeline,
      store,
      similarityThreshold: config.searchSimilarityThreshold,
    });
  } else {
    log.warn('No embedding client configured; semantic search is disabled');
  }

  const engine = new SearchEngine({
    databasePath: config.dbPath,
    adapter,
    settings: {
      vectorThreshold: config.searchVectorThreshold,
      resultLimitFactor: config.searchResultLimitFactor,
      minResults: config.searchMinResults,
    },
  });

  log.info('Search stack ready', { dbPath: config.dbPath, model: config.embeddingModel, semantic: adapter !== null });

  return {
    engine,
    adapter,
    pipeline,
    store,
    close: () => db.$client.close(),
  };
}
