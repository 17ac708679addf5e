/**
 * Database migration runner.
 *
 * Uses CREATE TABLE IF NOT EXISTS for idempotent startup. Only the
 * tables the search and embedding layers read are created here.
 */

import { sql } from 'drizzle-orm';
import type { SqliteDb } from './index.js';

export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS scripts (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      title TEXT NOT NULL,
      author TEXT,
      metadata TEXT,
      created_at TEXT NOT NULL DEFAULT ''
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS scenes (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      script_id INTEGER NOT NULL REFERENCES scripts(id) ON DELETE CASCADE,
      scene_number INTEGER NOT NULL,
      heading TEXT NOT NULL,
      location TEXT,
      time_of_day TEXT,
      content TEXT NOT NULL DEFAULT ''
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS characters (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      script_id INTEGER NOT NULL REFERENCES scripts(id) ON DELETE CASCADE,
      name TEXT NOT NULL
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS dialogues (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      scene_id INTEGER NOT NULL REFERENCES scenes(id) ON DELETE CASCADE,
      character_id INTEGER REFERENCES characters(id) ON DELETE SET NULL,
      dialogue_text TEXT NOT NULL,
      order_in_scene INTEGER NOT NULL DEFAULT 0,
      metadata TEXT
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS actions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      scene_id INTEGER NOT NULL REFERENCES scenes(id) ON DELETE CASCADE,
      action_text TEXT NOT NULL,
      order_in_scene INTEGER NOT NULL DEFAULT 0
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS script_bibles (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      script_id INTEGER NOT NULL REFERENCES scripts(id) ON DELETE CASCADE,
      title TEXT
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS bible_chunks (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      bible_id INTEGER NOT NULL REFERENCES script_bibles(id) ON DELETE CASCADE,
      chunk_number INTEGER NOT NULL,
      heading TEXT,
      level INTEGER,
      content TEXT NOT NULL
    )
  `);

  db.run(sql`
    CREATE TABLE IF NOT EXISTS embeddings (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      entity_type TEXT NOT NULL,
      entity_id INTEGER NOT NULL,
      embedding_model TEXT NOT NULL,
      embedding BLOB NOT NULL,
      dimensions INTEGER NOT NULL,
      metadata TEXT,
      created_at TEXT NOT NULL
    )
  `);

  // ─── Indexes ──────────────────────────────────────────────
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_scenes_script ON scenes(script_id, scene_number)`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS idx_characters_script_name ON characters(script_id, name)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_dialogues_scene ON dialogues(scene_id)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_actions_scene ON actions(scene_id)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_bible_chunks_bible ON bible_chunks(bible_id, chunk_number)`);
  db.run(sql`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_embeddings_entity_model
    ON embeddings(entity_type, entity_id, embedding_model)
  `);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_embeddings_type_model ON embeddings(entity_type, embedding_model)`);
}
