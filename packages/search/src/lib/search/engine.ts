/**
 * SearchEngine: runs structural SQL search over scenes, optionally
 * enhances it with semantic hits and searches script-bible chunks.
 *
 * Each call opens its own read-only connection and closes it before
 * returning.
 */

import {
  DEFAULT_SEARCH_MIN_RESULTS,
  DEFAULT_SEARCH_RESULT_LIMIT_FACTOR,
  DEFAULT_SEARCH_VECTOR_THRESHOLD,
  bibleChunkRowSchema,
  countRowSchema,
  getErrorMessage,
  sceneRowSchema,
  scriptMetadataSchema,
} from '@scriptdex/core';
import type {
  BibleChunkRow,
  MatchType,
  Metadata,
  SceneRow,
  SearchQuery,
  SearchResponse,
  SearchResult,
} from '@scriptdex/core';
import type { z } from 'zod';
import { openReadOnlyDb, type ReadOnlyConnection } from '../../db/index.js';
import { QueryBuilder, type BuiltQuery } from './query-builder.js';
import { semanticQueryText, type SemanticEnhancer } from './semantic-adapter.js';
import { extractHighlights } from './highlights.js';
import { createLogger } from '../logger.js';

const log = createLogger('SearchEngine');

export interface SearchSettings {
  /** Word count at which AUTO mode adds semantic search */
  vectorThreshold: number;
  /** Fraction of the page size requested from semantic search */
  resultLimitFactor: number;
  /** Floor for the semantic search limit */
  minResults: number;
}

export interface SearchEngineOptions {
  databasePath: string;
  /** Semantic layer; without one, semantic attempts are logged and skipped */
  adapter?: SemanticEnhancer | null;
  queryBuilder?: QueryBuilder;
  settings?: Partial<SearchSettings>;
  /** Opens the per-call read-only connection */
  openConnection?: (databasePath: string) => ReadOnlyConnection;
}

/** dialogue > action > characters > locations > text */
export function determineMatchType(query: SearchQuery): MatchType {
  if (query.dialogue) return 'dialogue';
  if (query.action) return 'action';
  if (query.characters) return 'character';
  if (query.locations) return 'location';
  return 'text';
}

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

function parseScriptMetadata(row: SceneRow): z.infer<typeof scriptMetadataSchema> {
  if (!row.script_metadata) return {};
  try {
    const parsed = scriptMetadataSchema.safeParse(JSON.parse(row.script_metadata));
    if (parsed.success) return parsed.data;
    log.warn(`Ignoring unexpected metadata shape for script ${row.script_id}`);
  } catch (err) {
    log.warn(`Failed to parse metadata for script ${row.script_id}`, { error: getErrorMessage(err) });
  }
  return {};
}

export class SearchEngine {
  private readonly databasePath: string;
  private readonly adapter: SemanticEnhancer | null;
  private readonly queryBuilder: QueryBuilder;
  private readonly settings: SearchSettings;
  private readonly openConnection: (databasePath: string) => ReadOnlyConnection;

  constructor(options: SearchEngineOptions) {
    this.databasePath = options.databasePath;
    this.adapter = options.adapter ?? null;
    this.queryBuilder = options.queryBuilder ?? new QueryBuilder();
    this.settings = {
      vectorThreshold: options.settings?.vectorThreshold ?? DEFAULT_SEARCH_VECTOR_THRESHOLD,
      resultLimitFactor: options.settings?.resultLimitFactor ?? DEFAULT_SEARCH_RESULT_LIMIT_FACTOR,
      minResults: options.settings?.minResults ?? DEFAULT_SEARCH_MIN_RESULTS,
    };
    this.openConnection = options.openConnection ?? openReadOnlyDb;
  }

  /** STRICT never, FUZZY always, AUTO once the search text is long enough. */
  needsSemanticSearch(query: SearchQuery): boolean {
    switch (query.mode) {
      case 'strict':
        return false;
      case 'fuzzy':
        return true;
      case 'auto':
        return wordCount(semanticQueryText(query) ?? query.rawQuery) >= this.settings.vectorThreshold;
    }
  }

  /** Number of semantic hits requested for a page of `limit`. */
  semanticLimit(limit: number): number {
    return Math.max(this.settings.minResults, Math.round(limit * this.settings.resultLimitFactor));
  }

  async search(query: SearchQuery): Promise<SearchResponse> {
    const started = performance.now();
    const conn = this.openConnection(this.databasePath);

    try {
      let results: SearchResult[] = [];
      let totalCount = 0;
      let bibleResults: SearchResult[] = [];
      let bibleTotalCount = 0;
      const searchMethods = ['sql'];

      if (!query.onlyBible) {
        const rows = this.fetchRows(conn, this.queryBuilder.buildSearchQuery(query), sceneRowSchema);
        totalCount = this.fetchCount(conn, this.queryBuilder.buildCountQuery(query));
        const matchType = determineMatchType(query);
        const term = semanticQueryText(query);
        results = rows.map((row) => this.toSceneResult(row, matchType, term));
      }

      if (query.includeBible || query.onlyBible) {
        ({ bibleResults, bibleTotalCount } = this.searchBible(conn, query));
      }

      if (this.needsSemanticSearch(query)) {
        searchMethods.push('semantic');
        ({ results, bibleResults } = await this.enhance(query, results, bibleResults));
      }

      const executionTimeMs = performance.now() - started;
      log.info(
        `Search completed: ${results.length + bibleResults.length} results ` +
          `(scenes: ${results.length}, bible: ${bibleResults.length}) in ${executionTimeMs.toFixed(2)}ms`,
      );

      return {
        query,
        results,
        bibleResults,
        totalCount,
        bibleTotalCount,
        hasMore: query.offset + query.limit < totalCount + bibleTotalCount,
        executionTimeMs,
        searchMethods,
      };
    } finally {
      conn.close();
    }
  }

  private async enhance(
    query: SearchQuery,
    results: SearchResult[],
    bibleResults: SearchResult[],
  ): Promise<{ results: SearchResult[]; bibleResults: SearchResult[] }> {
    if (!this.adapter) {
      log.warn('Semantic search requested but no semantic adapter is configured');
      return { results, bibleResults };
    }

    try {
      const enhanced = await this.adapter.enhanceResults(query, results, this.semanticLimit(query.limit));
      const seen = new Set(bibleResults.map((r) => r.id));
      const mergedBible = [...bibleResults];
      for (const hit of enhanced.bibleResults) {
        if (seen.has(hit.id)) continue;
        seen.add(hit.id);
        mergedBible.push(hit);
      }
      return { results: enhanced.results, bibleResults: mergedBible };
    } catch (err) {
      log.error('Semantic search failed, falling back to SQL results', {
        error: err,
        query: query.rawQuery.slice(0, 100),
      });
      return { results, bibleResults };
    }
  }

  /** Bible failures degrade to an empty set. */
  private searchBible(
    conn: ReadOnlyConnection,
    query: SearchQuery,
  ): { bibleResults: SearchResult[]; bibleTotalCount: number } {
    try {
      const rows = this.fetchRows(conn, this.queryBuilder.buildBibleSearchQuery(query), bibleChunkRowSchema);
      const bibleTotalCount = this.fetchCount(conn, this.queryBuilder.buildBibleCountQuery(query));
      return { bibleResults: rows.map((row) => this.toBibleResult(row, query.textQuery)), bibleTotalCount };
    } catch (err) {
      log.error('Bible search failed', { error: getErrorMessage(err), project: query.project });
      return { bibleResults: [], bibleTotalCount: 0 };
    }
  }

  private fetchRows<T>(conn: ReadOnlyConnection, built: BuiltQuery, schema: z.ZodType<T>): T[] {
    if (log.isEnabled('debug')) log.debug('Executing query', { sql: built.sql.slice(0, 200), params: built.params.length });
    const rows: T[] = [];
    for (const raw of conn.prepare(built.sql).all(...built.params)) {
      const parsed = schema.safeParse(raw);
      if (parsed.success) rows.push(parsed.data);
      else log.warn('Skipping malformed row', { issues: parsed.error.issues.length });
    }
    return rows;
  }

  /** A missing or malformed count row counts as zero. */
  private fetchCount(conn: ReadOnlyConnection, built: BuiltQuery): number {
    const parsed = countRowSchema.safeParse(conn.prepare(built.sql).get(...built.params));
    return parsed.success ? parsed.data.total : 0;
  }

  private toSceneResult(row: SceneRow, matchType: MatchType, term: string | undefined): SearchResult {
    const meta = parseScriptMetadata(row);
    const metadata: Metadata = {
      script_id: row.script_id,
      script_title: row.script_title,
      script_author: row.script_author,
      scene_number: row.scene_number,
      scene_heading: row.scene_heading,
      scene_location: row.scene_location,
      scene_time: row.scene_time,
      season: meta.season ?? null,
      episode: meta.episode ?? null,
      match_type: matchType,
    };
    return {
      type: 'scene',
      id: String(row.scene_id),
      content: row.scene_content,
      score: 1,
      metadata,
      highlights: extractHighlights(row.scene_content, term),
    };
  }

  private toBibleResult(row: BibleChunkRow, term: string | undefined): SearchResult {
    return {
      type: 'bible_chunk',
      id: String(row.chunk_id),
      content: row.chunk_content,
      score: 1,
      metadata: {
        script_id: row.script_id,
        script_title: row.script_title,
        bible_id: row.bible_id,
        bible_title: row.bible_title,
        chunk_heading: row.chunk_heading,
        chunk_level: row.chunk_level,
        match_type: 'text',
      },
      highlights: extractHighlights(row.chunk_content, term),
    };
  }
}
