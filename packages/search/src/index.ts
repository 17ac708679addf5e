/**
 * @scriptdex/search: screenplay search engine and embedding subsystem
 */

export * from './config.js';
export * from './stack.js';

// Storage
export * from './db/index.js';
export * from './db/migrate.js';
export * from './db/schema.sqlite.js';
export * from './db/vector-store.js';
export * from './db/file-vector-store.js';
export * from './db/sqlite-vector-store.js';
export * from './db/hybrid-vector-store.js';

// Embeddings
export * from './lib/embeddings/codec.js';
export * from './lib/embeddings/math.js';
export * from './lib/embeddings/similarity.js';
export * from './lib/embeddings/preprocessing.js';
export * from './lib/embeddings/cache.js';
export * from './lib/embeddings/dimensions.js';
export * from './lib/embeddings/openai.js';
export * from './lib/embeddings/batch-processor.js';
export * from './lib/embeddings/pipeline.js';

// Search
export * from './lib/search/query-builder.js';
export * from './lib/search/ranker.js';
export * from './lib/search/highlights.js';
export * from './lib/search/semantic-adapter.js';
export * from './lib/search/engine.js';

export { createLogger, isLogLevel, LOG_LEVELS } from './lib/logger.js';
export type { LogFields, LogLevel, Logger, LoggerOptions } from './lib/logger.js';
export { withRetry, backoffDelay } from './lib/retry.js';
