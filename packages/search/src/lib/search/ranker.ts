/**
 * Composite relevance scoring and deduplication for mixed result types.
 */

import type { Metadata, SearchResult } from '@scriptdex/core';

const TYPE_WEIGHTS: Readonly<Record<string, number>> = {
  scene: 1.0,
  dialogue: 0.9,
  character: 0.85,
  action: 0.8,
  location: 0.75,
  object: 0.7,
};

const DEFAULT_TYPE_WEIGHT = 0.5;
const EXACT_MATCH_BOOST = 1.2;

/** Metadata keys whose value containing the query boosts a result */
const METADATA_BOOSTS: ReadonlyArray<[string, number]> = [
  ['character', 0.15],
  ['scene_heading', 0.1],
  ['description', 0.05],
];

function resultKey(result: SearchResult): string {
  return `${result.type}:${result.id}`;
}

function byScoreDesc(a: SearchResult, b: SearchResult): number {
  return b.score - a.score;
}

function dedupe(results: SearchResult[]): SearchResult[] {
  const seen = new Set<string>();
  return results.filter((result) => {
    const key = resultKey(result);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  let at = haystack.indexOf(needle);
  while (at !== -1) {
    count++;
    at = haystack.indexOf(needle, at + needle.length);
  }
  return count;
}

function words(text: string): string[] {
  return text.split(/\s+/).filter(Boolean);
}

/** 0 to 0.5, from how often query words appear in the content. */
export function densityBoost(query: string, content: string): number {
  if (!query || !content) return 0;
  const contentLower = content.toLowerCase();
  const wordCount = words(contentLower).length;
  if (wordCount === 0) return 0;

  let occurrences = 0;
  for (const word of words(query.toLowerCase())) {
    occurrences += countOccurrences(contentLower, word);
  }
  return Math.min(0.5, (occurrences / wordCount) * 5);
}

export function hasExactMatch(query: string, content: string): boolean {
  if (!query || !content) return false;
  return content.toLowerCase().includes(query.toLowerCase());
}

export function metadataBoost(query: string, metadata: Metadata): number {
  if (!query) return 0;
  const queryLower = query.toLowerCase();
  let boost = 0;
  for (const [key, amount] of METADATA_BOOSTS) {
    const value = metadata[key];
    if (value !== undefined && value !== null && String(value).toLowerCase().includes(queryLower)) {
      boost += amount;
    }
  }
  return boost;
}

/**
 * In (0.9, 1] for a finite, non-negative script order; 1 for anything else,
 * so a negative order can never flip the sign or divide by zero.
 */
export function recencyFactor(order: unknown): number {
  if (typeof order !== 'number' || !Number.isFinite(order) || order < 0) return 1;
  return 0.9 + 0.1 / (1 + order / 1000);
}

export class SearchRanker {
  /**
   * Score in [0, 1] from the result's own score, its type, query-term
   * density, exact and metadata matches and (optionally) script order.
   */
  compositeScore(result: SearchResult, query: string, boostRecent = true): number {
    let score = result.score * (TYPE_WEIGHTS[result.type] ?? DEFAULT_TYPE_WEIGHT);
    score *= 1 + densityBoost(query, result.content);
    if (hasExactMatch(query, result.content)) score *= EXACT_MATCH_BOOST;
    score *= 1 + metadataBoost(query, result.metadata);

    if (boostRecent) score *= recencyFactor(result.metadata['script_order']);

    if (Number.isNaN(score)) return 0;
    return Math.max(0, Math.min(1, score));
  }

  /** Rescore, sort descending and drop (type, id) duplicates. */
  rankResults(results: SearchResult[], query: string, boostRecent = true): SearchResult[] {
    const scored = results.map((result) => ({ ...result, score: this.compositeScore(result, query, boostRecent) }));
    return dedupe(scored.sort(byScoreDesc));
  }

  filterResults(results: SearchResult[], minScore = 0, maxResults?: number, deduplicate = true): SearchResult[] {
    let filtered = results.filter((result) => result.score >= minScore);
    if (deduplicate) filtered = dedupe(filtered);
    return maxResults === undefined ? filtered : filtered.slice(0, maxResults);
  }

  groupResultsByType(results: SearchResult[]): Map<SearchResult['type'], SearchResult[]> {
    const groups = new Map<SearchResult['type'], SearchResult[]>();
    for (const result of results) {
      const group = groups.get(result.type);
      if (group) group.push(result);
      else groups.set(result.type, [result]);
    }
    return groups;
  }

  /**
   * Concatenate result sets. With a query they are re-ranked; without
   * one they keep their scores and are only sorted and deduplicated.
   */
  mergeResults(resultSets: SearchResult[][], query?: string): SearchResult[] {
    const all = resultSets.flat();
    if (query) return this.rankResults(all, query);
    return dedupe([...all].sort(byScoreDesc));
  }
}
