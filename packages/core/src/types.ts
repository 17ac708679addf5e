/**
 * @scriptdex/core: Core Search and Embedding Types
 */

// ─── Identifiers ────────────────────────────────────────────────────

/**
 * Relational primary key of an indexed entity (scene, bible chunk, …)
 */
export type EntityId = number;

/**
 * Kinds of entity that carry embeddings
 */
export type EmbeddingEntityType = 'scene' | 'bible_chunk' | 'dialogue' | 'action' | 'character' | 'location';

/** Free-form metadata mapping attached to results and embeddings */
export type Metadata = Record<string, unknown>;

/** An embedding vector of 32-bit floats */
export type EmbeddingVector = Float32Array;

// ─── Search Query ───────────────────────────────────────────────────

/**
 * How eagerly the engine adds semantic search on top of SQL search.
 * - strict: never
 * - fuzzy: always
 * - auto: when the search text is long enough
 */
export type SearchMode = 'auto' | 'strict' | 'fuzzy';

export const SEARCH_MODES: readonly SearchMode[] = ['auto', 'strict', 'fuzzy'];

/**
 * A parsed search request. Produced by an external query parser and
 * consumed once by the search engine.
 */
export interface SearchQuery {
  /** The user's raw query string */
  rawQuery: string;
  /** Free text to match against scene content and action lines */
  textQuery?: string;
  /** Restrict to scenes where any of these characters speak */
  characters?: string[];
  /** Restrict to scene locations matching any of these */
  locations?: string[];
  /** Text to match inside dialogue lines */
  dialogue?: string;
  /** Text to match inside a dialogue parenthetical */
  parenthetical?: string;
  /** Text to match inside action lines */
  action?: string;
  /** Script (project) title filter */
  project?: string;
  seasonStart?: number;
  seasonEnd?: number;
  episodeStart?: number;
  episodeEnd?: number;
  mode: SearchMode;
  limit: number;
  offset: number;
  /** Also search script-bible chunks */
  includeBible: boolean;
  /** Search script-bible chunks only */
  onlyBible: boolean;
}

// ─── Search Results ─────────────────────────────────────────────────

export type SearchResultType = 'scene' | 'dialogue' | 'action' | 'character' | 'location' | 'bible_chunk';

export const SEARCH_RESULT_TYPES: readonly SearchResultType[] = [
  'scene',
  'dialogue',
  'action',
  'character',
  'location',
  'bible_chunk',
];

/**
 * A single hit. Scores are in [0, 1]; (type, id) identifies the entity.
 */
export interface SearchResult {
  type: SearchResultType;
  id: string;
  /** Content snippet */
  content: string;
  score: number;
  metadata: Metadata;
  highlights: string[];
}

/** How a result matched the query, for display and explanation */
export type MatchType = 'dialogue' | 'action' | 'character' | 'location' | 'text' | 'semantic';

export interface SearchResponse {
  query: SearchQuery;
  results: SearchResult[];
  bibleResults: SearchResult[];
  /** Total scene matches for the SQL query (all pages) */
  totalCount: number;
  /** Total bible chunk matches (all pages) */
  bibleTotalCount: number;
  hasMore: boolean;
  executionTimeMs: number;
  /** Methods attempted for this call, e.g. ['sql', 'semantic'] */
  searchMethods: string[];
}

// ─── Embeddings ─────────────────────────────────────────────────────

/**
 * A stored embedding. Unique per (entityType, entityId, model).
 */
export interface EmbeddingRecord {
  entityType: string;
  entityId: EntityId;
  model: string;
  vector: EmbeddingVector;
  metadata?: Metadata;
}

/** A similarity search hit from a vector store */
export interface VectorSearchHit {
  entityId: EntityId;
  score: number;
  metadata: Metadata;
}

/** Request for the external `embed` call */
export interface EmbeddingRequest {
  model: string;
  input: string | string[];
  dimensions?: number;
}

/** Response of the external `embed` call */
export interface EmbeddingResponse {
  model: string;
  data: Array<{ embedding: number[]; index?: number }>;
  usage?: {
    promptTokens: number;
    totalTokens: number;
  };
}

/**
 * Anything that can turn text into embeddings. One call may carry
 * several inputs; `data` is returned in input order.
 */
export interface EmbeddingClient {
  embed(request: EmbeddingRequest): Promise<EmbeddingResponse>;
}

/** A scene submitted for embedding generation */
export interface SceneText {
  id: EntityId;
  heading: string;
  content: string;
}
