/**
 * SQLite schema for Scriptdex: defined with Drizzle ORM.
 *
 * Tables: scripts, scenes, characters, dialogues, actions,
 *         script_bibles, bible_chunks, embeddings
 * Only the columns the search queries read are modelled; the upstream
 * indexer owns everything else.
 */

import { sqliteTable, text, integer, blob, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

// ─── Scripts ──────────────────────────────────────────────
export const scripts = sqliteTable('scripts', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  author: text('author'),
  metadata: text('metadata'), // JSON: { season, episode, ... }
  createdAt: text('created_at').notNull().default(''),
});

// ─── Scenes ───────────────────────────────────────────────
export const scenes = sqliteTable(
  'scenes',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    scriptId: integer('script_id')
      .notNull()
      .references(() => scripts.id, { onDelete: 'cascade' }),
    sceneNumber: integer('scene_number').notNull(),
    heading: text('heading').notNull(),
    location: text('location'),
    timeOfDay: text('time_of_day'),
    content: text('content').notNull().default(''),
  },
  (table) => [
    index('idx_scenes_script').on(table.scriptId, table.sceneNumber),
  ],
);

// ─── Characters ───────────────────────────────────────────
export const characters = sqliteTable(
  'characters',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    scriptId: integer('script_id')
      .notNull()
      .references(() => scripts.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
  },
  (table) => [uniqueIndex('idx_characters_script_name').on(table.scriptId, table.name)],
);

// ─── Dialogues ────────────────────────────────────────────
export const dialogues = sqliteTable(
  'dialogues',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sceneId: integer('scene_id')
      .notNull()
      .references(() => scenes.id, { onDelete: 'cascade' }),
    characterId: integer('character_id').references(() => characters.id, { onDelete: 'set null' }),
    dialogueText: text('dialogue_text').notNull(),
    orderInScene: integer('order_in_scene').notNull().default(0),
    metadata: text('metadata'), // JSON: { parenthetical }
  },
  (table) => [index('idx_dialogues_scene').on(table.sceneId)],
);

// ─── Actions ──────────────────────────────────────────────
export const actions = sqliteTable(
  'actions',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    sceneId: integer('scene_id')
      .notNull()
      .references(() => scenes.id, { onDelete: 'cascade' }),
    actionText: text('action_text').notNull(),
    orderInScene: integer('order_in_scene').notNull().default(0),
  },
  (table) => [index('idx_actions_scene').on(table.sceneId)],
);

// ─── Script Bibles ────────────────────────────────────────
export const scriptBibles = sqliteTable('script_bibles', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  scriptId: integer('script_id')
    .notNull()
    .references(() => scripts.id, { onDelete: 'cascade' }),
  title: text('title'),
});

export const bibleChunks = sqliteTable(
  'bible_chunks',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    bibleId: integer('bible_id')
      .notNull()
      .references(() => scriptBibles.id, { onDelete: 'cascade' }),
    chunkNumber: integer('chunk_number').notNull(),
    heading: text('heading'),
    level: integer('level'),
    content: text('content').notNull(),
  },
  (table) => [index('idx_bible_chunks_bible').on(table.bibleId, table.chunkNumber)],
);

// ─── Embeddings ───────────────────────────────────────────
export const embeddings = sqliteTable(
  'embeddings',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    entityType: text('entity_type').notNull(), // 'scene', 'bible_chunk', ...
    entityId: integer('entity_id').notNull(),
    embeddingModel: text('embedding_model').notNull(),
    embedding: blob('embedding', { mode: 'buffer' }).notNull(), // codec format
    dimensions: integer('dimensions').notNull(),
    metadata: text('metadata'), // JSON
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    uniqueIndex('idx_embeddings_entity_model').on(table.entityType, table.entityId, table.embeddingModel),
    index('idx_embeddings_type_model').on(table.entityType, table.embeddingModel),
  ],
);
