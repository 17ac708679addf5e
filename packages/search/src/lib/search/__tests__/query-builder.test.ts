import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { z } from 'zod';
import { bibleChunkRowSchema, countRowSchema, parseSearchQuery, sceneRowSchema } from '@scriptdex/core';
import type { SearchQueryInput } from '@scriptdex/core';
import { createTestDb, type SqliteDb } from '../../../db/index.js';
import { runMigrations } from '../../../db/migrate.js';
import { seedCorpus } from '../../../db/__tests__/seed.js';
import { QueryBuilder, type BuiltQuery } from '../query-builder.js';

const builder = new QueryBuilder();

function query(input: Partial<SearchQueryInput> = {}) {
  return parseSearchQuery({ rawQuery: 'test', ...input });
}

describe('QueryBuilder', () => {
  let db: SqliteDb;

  beforeAll(() => {
    db = createTestDb();
    runMigrations(db);
    seedCorpus(db);
  });

  afterAll(() => {
    db.$client.close();
  });

  function run(built: BuiltQuery): unknown[] {
    return db.$client.prepare(built.sql).all(...built.params);
  }

  /** Scene ids of the page and the total from the count query. */
  function scenes(input: Partial<SearchQueryInput>): { ids: number[]; total: number } {
    const q = query(input);
    const rows = z.array(sceneRowSchema).parse(run(builder.buildSearchQuery(q)));
    const [count] = z.array(countRowSchema).parse(run(builder.buildCountQuery(q)));
    return { ids: rows.map((r) => r.scene_id), total: count.total };
  }

  function chunks(input: Partial<SearchQueryInput>): { ids: number[]; total: number } {
    const q = query(input);
    const rows = z.array(bibleChunkRowSchema).parse(run(builder.buildBibleSearchQuery(q)));
    const [count] = z.array(countRowSchema).parse(run(builder.buildBibleCountQuery(q)));
    return { ids: rows.map((r) => r.chunk_id), total: count.total };
  }

  it('returns every scene ordered by script and scene number without filters', () => {
    expect(scenes({ limit: 10 })).toEqual({ ids: [10, 11, 20], total: 3 });
  });

  it('pages with LIMIT and OFFSET while counting all matches', () => {
    const built = builder.buildSearchQuery(query({ limit: 2, offset: 1 }));
    expect(built.sql.endsWith('LIMIT ? OFFSET ?')).toBe(true);
    expect(built.params).toEqual([2, 1]);
    expect(scenes({ limit: 2, offset: 1 })).toEqual({ ids: [11, 20], total: 3 });
  });

  it('matches free text in scene content or action lines', () => {
    expect(scenes({ textQuery: 'harbor' }).ids).toEqual([11]);
    expect(scenes({ textQuery: 'lamp' }).ids).toEqual([10]);
  });

  it('prefers the action text over the free text', () => {
    expect(scenes({ textQuery: 'harbor', action: 'counter' }).ids).toEqual([20]);
  });

  it('restricts text matches to scenes where a listed character speaks', () => {
    expect(scenes({ action: 'counter', characters: ['MARA'] })).toEqual({ ids: [], total: 0 });
    expect(scenes({ action: 'counter', characters: ['MARA', 'PEARL'] }).ids).toEqual([20]);
  });

  it('searches dialogue and filters speakers by exact name', () => {
    expect(scenes({ dialogue: 'tide' }).ids).toEqual([11]);
    expect(scenes({ dialogue: 'the' })).toEqual({ ids: [10, 11], total: 2 });
    expect(scenes({ dialogue: 'the', characters: ['MARA'] }).ids).toEqual([10]);
    expect(scenes({ dialogue: 'the', characters: ['Mara'] }).ids).toEqual([]);
  });

  it('filters dialogue by parenthetical', () => {
    expect(scenes({ dialogue: 'light', parenthetical: 'whisper' }).ids).toEqual([10]);
    expect(scenes({ dialogue: 'light', parenthetical: 'shouting' }).ids).toEqual([]);
  });

  it('finds scenes by speaker alone', () => {
    expect(scenes({ characters: ['PEARL', 'JONAS'] })).toEqual({ ids: [11, 20], total: 2 });
  });

  it('matches any of several locations', () => {
    expect(scenes({ locations: ['dock', 'diner'] }).ids).toEqual([11, 20]);
  });

  it('matches the project title as a substring', () => {
    expect(scenes({ project: 'harbor' }).ids).toEqual([10, 11]);
  });

  it('filters a single episode and tolerates malformed script metadata', () => {
    expect(scenes({ seasonStart: 1, episodeStart: 2 }).ids).toEqual([10, 11]);
    expect(scenes({ seasonStart: 1, episodeStart: 3 }).ids).toEqual([]);
    // no episode: compares against NULL and matches nothing
    expect(scenes({ seasonStart: 1 }).ids).toEqual([]);
  });

  it('filters a season and episode range', () => {
    expect(scenes({ seasonStart: 1, seasonEnd: 2, episodeStart: 1, episodeEnd: 3 }).ids).toEqual([10, 11]);
    expect(scenes({ seasonStart: 2, seasonEnd: 3, episodeStart: 1, episodeEnd: 3 }).ids).toEqual([]);
  });

  it('passes user text only as parameters', () => {
    const hostile = "'; DROP TABLE scenes; --";
    const built = builder.buildSearchQuery(query({ textQuery: hostile, characters: [hostile], locations: [hostile] }));

    expect(built.sql).not.toContain('DROP');
    expect(built.params).toContain(`%${hostile}%`);
    expect(run(built)).toEqual([]);
    expect(scenes({ limit: 10 }).total).toBe(3);
  });

  describe('bible queries', () => {
    it('matches chunk content or heading', () => {
      expect(chunks({ textQuery: 'mara' })).toEqual({ ids: [300], total: 1 });
      expect(chunks({ textQuery: 'town' })).toEqual({ ids: [301], total: 1 });
    });

    it('returns every chunk without text', () => {
      expect(chunks({})).toEqual({ ids: [300, 301], total: 2 });
    });

    it('filters by exact project title', () => {
      expect(chunks({ project: 'Harbor Lights' }).ids).toEqual([300, 301]);
      expect(chunks({ project: 'Harbor' })).toEqual({ ids: [], total: 0 });
    });

    it('pages while counting every match', () => {
      expect(chunks({ limit: 1, offset: 1 })).toEqual({ ids: [301], total: 2 });
    });
  });
});
