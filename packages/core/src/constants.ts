/**
 * @scriptdex/core: Shared Constants
 */

/** Default number of results per page */
export const DEFAULT_PAGE_SIZE = 5;

/** Maximum number of results per page */
export const MAX_PAGE_SIZE = 500;

/** Hard cap on the dimension field of a serialized embedding */
export const MAX_EMBEDDING_DIMENSION = 10_000;

/** Default embedding model */
export const DEFAULT_EMBEDDING_MODEL = 'text-embedding-3-small';

// ─── Search Defaults ────────────────────────────────────────────────

/** Word count at which AUTO mode adds semantic search */
export const DEFAULT_SEARCH_VECTOR_THRESHOLD = 10;

/** Minimum cosine similarity for a semantic hit */
export const DEFAULT_SEARCH_SIMILARITY_THRESHOLD = 0.3;

/** Fraction of the page size requested from semantic search */
export const DEFAULT_SEARCH_RESULT_LIMIT_FACTOR = 0.5;

/** Floor for the semantic search limit */
export const DEFAULT_SEARCH_MIN_RESULTS = 5;

// ─── Embedding Pipeline Defaults ────────────────────────────────────

export const DEFAULT_MAX_TEXT_LENGTH = 8000;
export const DEFAULT_CHUNK_SIZE = 1000;
export const DEFAULT_CHUNK_OVERLAP = 200;
export const DEFAULT_BATCH_SIZE = 10;
export const DEFAULT_MAX_CONCURRENT = 3;
export const DEFAULT_CACHE_MAX_SIZE = 10_000;

/** 30 days */
export const DEFAULT_CACHE_TTL_SECONDS = 86_400 * 30;
