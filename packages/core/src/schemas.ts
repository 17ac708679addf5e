/**
 * @scriptdex/core: Zod Validation Schemas
 *
 * Runtime validation for search queries handed over by external parsers
 * and for rows coming back from the relational store.
 */
import { z } from 'zod';
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from './constants.js';
import type { SearchQuery } from './types.js';

/**
 * Schema for validating search modes
 */
export const searchModeSchema = z.enum(['auto', 'strict', 'fuzzy']);

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((v) => (v ? v : undefined));

const nameList = z
  .array(z.string().trim().min(1))
  .optional()
  .transform((v) => (v && v.length > 0 ? v : undefined));

/**
 * Schema for a parsed search query. Applies defaults for mode,
 * pagination and bible flags.
 */
export const searchQuerySchema = z.object({
  rawQuery: z.string(),
  textQuery: optionalText,
  characters: nameList,
  locations: nameList,
  dialogue: optionalText,
  parenthetical: optionalText,
  action: optionalText,
  project: optionalText,
  seasonStart: z.number().int().nonnegative().optional(),
  seasonEnd: z.number().int().nonnegative().optional(),
  episodeStart: z.number().int().nonnegative().optional(),
  episodeEnd: z.number().int().nonnegative().optional(),
  mode: searchModeSchema.default('auto'),
  limit: z.number().int().min(1).max(MAX_PAGE_SIZE).default(DEFAULT_PAGE_SIZE),
  offset: z.number().int().nonnegative().default(0),
  includeBible: z.boolean().default(false),
  onlyBible: z.boolean().default(false),
});

export type SearchQueryInput = z.input<typeof searchQuerySchema>;

/**
 * Validate and normalise a search query. Throws a ZodError on invalid input.
 */
export function parseSearchQuery(input: SearchQueryInput): SearchQuery {
  return searchQuerySchema.parse(input);
}

// ─── Relational Row Schemas ─────────────────────────────────────────

/**
 * A scene row produced by the search query builder.
 */
export const sceneRowSchema = z.object({
  script_id: z.number(),
  script_title: z.string(),
  script_author: z.string().nullable(),
  script_metadata: z.string().nullable(),
  scene_id: z.number(),
  scene_number: z.number(),
  scene_heading: z.string(),
  scene_location: z.string().nullable(),
  scene_time: z.string().nullable(),
  scene_content: z.string(),
});

export type SceneRow = z.infer<typeof sceneRowSchema>;

/**
 * A bible chunk row produced by the bible search query.
 */
export const bibleChunkRowSchema = z.object({
  script_id: z.number(),
  script_title: z.string(),
  bible_id: z.number(),
  bible_title: z.string().nullable(),
  chunk_id: z.number(),
  chunk_heading: z.string().nullable(),
  chunk_level: z.number().nullable(),
  chunk_content: z.string(),
});

export type BibleChunkRow = z.infer<typeof bibleChunkRowSchema>;

/**
 * A COUNT(*) row. Anything else is treated as zero matches.
 */
export const countRowSchema = z.object({
  total: z.number().int().nonnegative(),
});

/**
 * Season/episode metadata stored as JSON on a script.
 */
export const scriptMetadataSchema = z
  .object({
    season: z.number().int().optional(),
    episode: z.number().int().optional(),
  })
  .passthrough();
