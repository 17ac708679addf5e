import { describe, it, expect } from 'vitest';
import type { SearchResult } from '@scriptdex/core';
import { SearchRanker, densityBoost, hasExactMatch, metadataBoost, recencyFactor } from '../ranker.js';

function result(overrides: Partial<SearchResult> & Pick<SearchResult, 'id'>): SearchResult {
  return {
    type: 'scene',
    content: '',
    score: 1,
    metadata: {},
    highlights: [],
    ...overrides,
  };
}

describe('scoring helpers', () => {
  it('computes density from substring occurrences per content word', () => {
    expect(densityBoost('tide', `tide ${'x '.repeat(19)}`)).toBeCloseTo(0.25);
    expect(densityBoost('the', 'there the')).toBe(0.5);
    expect(densityBoost('', 'content')).toBe(0);
    expect(densityBoost('query', '   ')).toBe(0);
  });

  it('matches exact substrings case-insensitively', () => {
    expect(hasExactMatch('Light', 'the LIGHT stays on')).toBe(true);
    expect(hasExactMatch('light on', 'the light stays on')).toBe(false);
  });

  it('sums metadata boosts for fields containing the query', () => {
    expect(metadataBoost('mara', { character: 'MARA', scene_heading: 'INT. MARA HOUSE', description: 'x' })).toBeCloseTo(
      0.25,
    );
    expect(metadataBoost('mara', { description: 'Mara at dawn' })).toBeCloseTo(0.05);
    expect(metadataBoost('mara', { other: 'mara' })).toBe(0);
  });
});

describe('recencyFactor', () => {
  it('decays from 1 towards 0.9 as the order grows', () => {
    expect(recencyFactor(0)).toBe(1);
    expect(recencyFactor(1000)).toBeCloseTo(0.95);
    expect(recencyFactor(1e9)).toBeGreaterThan(0.9);
  });

  it('is neutral for invalid orders', () => {
    expect(recencyFactor(-1)).toBe(1);
    expect(recencyFactor(-1000)).toBe(1);
    expect(recencyFactor(Number.NaN)).toBe(1);
    expect(recencyFactor(Number.NEGATIVE_INFINITY)).toBe(1);
    expect(recencyFactor('12')).toBe(1);
    expect(recencyFactor(undefined)).toBe(1);
  });
});

describe('SearchRanker', () => {
  const ranker = new SearchRanker();

  it('combines type weight, density, exact match and metadata', () => {
    const scene = result({ id: '1', content: 'The light stays on', score: 0.5 });
    const line = result({
      id: '2',
      type: 'dialogue',
      content: 'Nothing here at all today',
      score: 0.8,
      metadata: { character: 'LIGHTKEEPER' },
    });

    const ranked = ranker.rankResults([line, scene], 'light');

    expect(ranked.map((r) => r.id)).toEqual(['1', '2']);
    expect(ranked[0].score).toBeCloseTo(0.9);
    expect(ranked[1].score).toBeCloseTo(0.828);
  });

  it('clamps scores to 1', () => {
    expect(ranker.compositeScore(result({ id: '1', content: 'light light' }), 'light')).toBe(1);
  });

  it('weights unknown types at 0.5', () => {
    expect(ranker.compositeScore(result({ id: '1', type: 'bible_chunk', content: 'x' }), 'zzz')).toBe(0.5);
  });

  it('applies the script order factor only when boosting', () => {
    const late = result({ id: '1', content: 'abc', score: 0.5, metadata: { script_order: 1000 } });

    expect(ranker.compositeScore(late, 'zzz')).toBeCloseTo(0.475);
    expect(ranker.compositeScore(late, 'zzz', false)).toBe(0.5);
    expect(ranker.compositeScore({ ...late, metadata: { script_order: '1000' } }, 'zzz')).toBe(0.5);
  });

  it('ignores script orders that are negative or not finite', () => {
    const base = result({ id: '1', content: 'abc', score: 0.5 });

    for (const order of [-500, -1000, -5000, Number.POSITIVE_INFINITY, Number.NaN]) {
      expect(ranker.compositeScore({ ...base, metadata: { script_order: order } }, 'zzz')).toBe(0.5);
    }
    expect(ranker.compositeScore({ ...base, score: 0, metadata: { script_order: -1000 } }, 'zzz')).toBe(0);
  });

  it('scores a NaN input score as 0', () => {
    expect(ranker.compositeScore(result({ id: '1', content: 'abc', score: Number.NaN }), 'zzz')).toBe(0);
  });

  it('keeps the highest-scoring copy of a duplicate', () => {
    const ranked = ranker.rankResults(
      [result({ id: '7', content: 'abc', score: 0.2 }), result({ id: '7', content: 'abc', score: 0.6 })],
      'zzz',
    );

    expect(ranked).toHaveLength(1);
    expect(ranked[0].score).toBeCloseTo(0.6);
  });

  it('does not mutate its input', () => {
    const input = result({ id: '1', content: 'light', score: 0.5 });
    ranker.rankResults([input], 'light');
    expect(input.score).toBe(0.5);
  });

  it('gives the same order and scores when ranking the same input twice', () => {
    const input = [
      result({ id: '1', type: 'action', content: 'the light fades', score: 0.7 }),
      result({ id: '2', type: 'dialogue', content: 'light the light', score: 0.9 }),
      result({ id: '1', type: 'action', content: 'the light fades', score: 0.4 }),
      result({ id: '3', content: 'nothing here', score: 1 }),
    ];

    const first = ranker.rankResults(input, 'light');
    const second = ranker.rankResults(input, 'light');

    expect(second).toEqual(first);
    expect(first).toHaveLength(3);
    for (const r of first) {
      expect(r.score).toBeGreaterThanOrEqual(0);
      expect(r.score).toBeLessThanOrEqual(1);
    }
  });

  it('filters by score, limit and duplicates', () => {
    const results = [
      result({ id: 'a', score: 0.9 }),
      result({ id: 'a', score: 0.8 }),
      result({ id: 'b', score: 0.4 }),
      result({ id: 'c', score: 0.1 }),
    ];

    expect(ranker.filterResults(results, 0.3).map((r) => r.id)).toEqual(['a', 'b']);
    expect(ranker.filterResults(results, 0.3, undefined, false).map((r) => r.id)).toEqual(['a', 'a', 'b']);
    expect(ranker.filterResults(results, 0, 2).map((r) => r.id)).toEqual(['a', 'b']);
  });

  it('groups by type in first-seen order', () => {
    const grouped = ranker.groupResultsByType([
      result({ id: '1', type: 'dialogue' }),
      result({ id: '2' }),
      result({ id: '3', type: 'dialogue' }),
    ]);

    expect([...grouped.keys()]).toEqual(['dialogue', 'scene']);
    expect(grouped.get('dialogue')?.map((r) => r.id)).toEqual(['1', '3']);
  });

  it('merges by existing score without a query', () => {
    const merged = ranker.mergeResults([
      [result({ id: 'a', score: 0.2 }), result({ id: 'b', score: 0.9 })],
      [result({ id: 'a', score: 0.5 }), result({ id: 'a', type: 'dialogue', score: 0.3 })],
    ]);

    expect(merged.map((r) => `${r.type}:${r.id}:${r.score}`)).toEqual(['scene:b:0.9', 'scene:a:0.5', 'dialogue:a:0.3']);
  });

  it('re-ranks merged sets when given a query', () => {
    const merged = ranker.mergeResults(
      [[result({ id: 'a', content: 'nothing', score: 0.9 })], [result({ id: 'b', content: 'the lamp', score: 0.9 })]],
      'lamp',
    );

    expect(merged.map((r) => r.id)).toEqual(['b', 'a']);
  });
});
