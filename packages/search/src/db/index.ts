/**
 * Database initialization.
 *
 * Read-write connections go through Drizzle; search reads use a raw
 * read-only better-sqlite3 handle because the query builder emits
 * positional SQL.
 */

import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.sqlite.js';

export type SqliteDb = BetterSQLite3Database<typeof schema> & { $client: Database.Database };
export type ReadOnlyConnection = Database.Database;

export interface CreateDbOptions {
  /** SQLite file path (default: SCRIPTDEX_DB_PATH or './scriptdex.db'). Use ':memory:' for tests. */
  databasePath?: string;
}

/**
 * Create a read-write database connection.
 *
 * Applies pragmas:
 * - journal_mode=WAL (concurrent read/write)
 * - synchronous=NORMAL
 * - busy_timeout=5000 (5s wait on locks)
 * - foreign_keys=ON (cascading entity deletion)
 */
export function createDb(options: CreateDbOptions = {}): SqliteDb {
  const dbPath = options.databasePath ?? process.env['SCRIPTDEX_DB_PATH'] ?? './scriptdex.db';
  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('busy_timeout = 5000');
  sqlite.pragma('foreign_keys = ON');

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory SQLite database for testing.
 */
export function createTestDb(): SqliteDb {
  return createDb({ databasePath: ':memory:' });
}

/**
 * Open an existing database file for reading only. Writes through this
 * handle fail at the SQLite level.
 */
export function openReadOnlyDb(databasePath: string): ReadOnlyConnection {
  const conn = new Database(databasePath, { readonly: true, fileMustExist: true });
  conn.pragma('query_only = ON');
  conn.pragma('busy_timeout = 5000');
  return conn;
}
