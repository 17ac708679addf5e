/**
 * Translates a {@link SearchQuery} into parameterised SQL for the scene
 * and bible-chunk searches. User text only ever travels as a parameter.
 */

import type { SearchQuery } from '@scriptdex/core';

export type SqlParam = string | number | null;

export interface BuiltQuery {
  sql: string;
  params: SqlParam[];
}

interface Clauses {
  joins: string[];
  conditions: string[];
  params: SqlParam[];
}

const SCENE_COLUMNS = [
  's.id AS script_id',
  's.title AS script_title',
  's.author AS script_author',
  's.metadata AS script_metadata',
  'sc.id AS scene_id',
  'sc.scene_number AS scene_number',
  'sc.heading AS scene_heading',
  'sc.location AS scene_location',
  'sc.time_of_day AS scene_time',
  'sc.content AS scene_content',
].join(', ');

const BIBLE_COLUMNS = [
  's.id AS script_id',
  's.title AS script_title',
  'sb.id AS bible_id',
  'sb.title AS bible_title',
  'bc.id AS chunk_id',
  'bc.heading AS chunk_heading',
  'bc.level AS chunk_level',
  'bc.content AS chunk_content',
].join(', ');

const SCENE_FROM = 'FROM scripts s INNER JOIN scenes sc ON s.id = sc.script_id';
const BIBLE_FROM =
  'FROM bible_chunks bc INNER JOIN script_bibles sb ON bc.bible_id = sb.id INNER JOIN scripts s ON sb.script_id = s.id';

const like = (value: string): string => `%${value}%`;

// Malformed JSON reads as NULL instead of failing the whole statement
const jsonField = (column: string, path: string): string =>
  `json_extract(CASE WHEN json_valid(${column}) THEN ${column} END, '${path}')`;

function speaksIn(alias: string): string {
  return (
    `EXISTS (SELECT 1 FROM dialogues d${alias} INNER JOIN characters c${alias} ON d${alias}.character_id = c${alias}.id ` +
    `WHERE d${alias}.scene_id = sc.id AND c${alias}.name = ?)`
  );
}

function anyOf(conditions: string[]): string {
  return conditions.length === 1 ? conditions[0] : `(${conditions.join(' OR ')})`;
}

export class QueryBuilder {
  /** One page of matching scenes, ordered by script then scene number. */
  buildSearchQuery(query: SearchQuery): BuiltQuery {
    const { joins, conditions, params } = this.sceneClauses(query);
    const sql = [
      `SELECT DISTINCT ${SCENE_COLUMNS}`,
      SCENE_FROM,
      ...joins,
      where(conditions),
      'ORDER BY s.id, sc.scene_number',
      'LIMIT ? OFFSET ?',
    ]
      .filter(Boolean)
      .join(' ');
    return { sql, params: [...params, query.limit, query.offset] };
  }

  /** Total matching scenes across all pages, as `total`. */
  buildCountQuery(query: SearchQuery): BuiltQuery {
    const { joins, conditions, params } = this.sceneClauses(query);
    const sql = ['SELECT COUNT(DISTINCT sc.id) AS total', SCENE_FROM, ...joins, where(conditions)]
      .filter(Boolean)
      .join(' ');
    return { sql, params };
  }

  /** One page of bible chunks matching the free text and project. */
  buildBibleSearchQuery(query: SearchQuery): BuiltQuery {
    const { conditions, params } = this.bibleClauses(query);
    const sql = [
      `SELECT ${BIBLE_COLUMNS}`,
      BIBLE_FROM,
      where(conditions),
      'ORDER BY bc.bible_id, bc.chunk_number',
      'LIMIT ? OFFSET ?',
    ]
      .filter(Boolean)
      .join(' ');
    return { sql, params: [...params, query.limit, query.offset] };
  }

  buildBibleCountQuery(query: SearchQuery): BuiltQuery {
    const { conditions, params } = this.bibleClauses(query);
    const sql = ['SELECT COUNT(*) AS total', BIBLE_FROM, where(conditions)].filter(Boolean).join(' ');
    return { sql, params };
  }

  private sceneClauses(query: SearchQuery): Clauses {
    const clauses: Clauses = { joins: [], conditions: [], params: [] };

    if (query.project) {
      clauses.conditions.push('s.title LIKE ?');
      clauses.params.push(like(query.project));
    }

    this.addSeasonEpisode(clauses, query);

    const text = query.action ?? query.textQuery;
    if (query.dialogue) {
      this.addDialogue(clauses, query.dialogue, query);
    } else if (text) {
      this.addText(clauses, text, query.characters);
    }

    if (query.locations) {
      clauses.conditions.push(anyOf(query.locations.map(() => 'sc.location LIKE ?')));
      clauses.params.push(...query.locations.map(like));
    }

    // Characters alone: scenes in which any of them speaks
    if (query.characters && !query.dialogue && !text) {
      clauses.conditions.push(anyOf(query.characters.map(() => speaksIn('3'))));
      clauses.params.push(...query.characters);
    }

    return clauses;
  }

  /**
   * A start season with an end season filters a season and episode range;
   * a start season alone filters one episode.
   */
  private addSeasonEpisode(clauses: Clauses, query: SearchQuery): void {
    if (query.seasonStart === undefined) return;

    const season = jsonField('s.metadata', '$.season');
    const episode = jsonField('s.metadata', '$.episode');
    if (query.seasonEnd !== undefined) {
      clauses.conditions.push(`(${season} >= ? AND ${season} <= ? AND ${episode} >= ? AND ${episode} <= ?)`);
      clauses.params.push(query.seasonStart, query.seasonEnd, query.episodeStart ?? null, query.episodeEnd ?? null);
    } else {
      clauses.conditions.push(`(${season} = ? AND ${episode} = ?)`);
      clauses.params.push(query.seasonStart, query.episodeStart ?? null);
    }
  }

  private addDialogue(clauses: Clauses, dialogue: string, query: SearchQuery): void {
    clauses.joins.push('INNER JOIN dialogues d ON sc.id = d.scene_id');
    clauses.conditions.push('d.dialogue_text LIKE ?');
    clauses.params.push(like(dialogue));

    if (query.characters) {
      clauses.joins.push('INNER JOIN characters c ON d.character_id = c.id');
      clauses.conditions.push(anyOf(query.characters.map(() => 'c.name = ?')));
      clauses.params.push(...query.characters);
    }

    if (query.parenthetical) {
      clauses.conditions.push(`${jsonField('d.metadata', '$.parenthetical')} LIKE ?`);
      clauses.params.push(like(query.parenthetical));
    }
  }

  /** Scene body or any action line, optionally restricted to speakers. */
  private addText(clauses: Clauses, text: string, characters: string[] | undefined): void {
    clauses.conditions.push(
      '(sc.content LIKE ? OR EXISTS (SELECT 1 FROM actions a WHERE a.scene_id = sc.id AND a.action_text LIKE ?))',
    );
    clauses.params.push(like(text), like(text));

    if (characters) {
      clauses.conditions.push(anyOf(characters.map(() => speaksIn('2'))));
      clauses.params.push(...characters);
    }
  }

  private bibleClauses(query: SearchQuery): Omit<Clauses, 'joins'> {
    const conditions: string[] = [];
    const params: SqlParam[] = [];
    if (query.textQuery) {
      conditions.push('(bc.content LIKE ? OR bc.heading LIKE ?)');
      params.push(like(query.textQuery), like(query.textQuery));
    }
    if (query.project) {
      conditions.push('s.title = ?');
      params.push(query.project);
    }
    return { conditions, params };
  }
}

function where(conditions: string[]): string {
  return conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
}
