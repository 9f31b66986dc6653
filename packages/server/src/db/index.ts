/**
 * Database initialization.
 *
 * SQLite via better-sqlite3, with WAL mode and tuned pragmas.
 */

import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as schema from './schema.sqlite.js';

export type SqliteDb = BetterSQLite3Database<typeof schema>;

export interface CreateDbOptions {
  /** SQLite file path (default: RUNWATCH_DB_PATH or './runwatch.db'). Use ':memory:' for tests. */
  databasePath?: string;
}

/**
 * Create a database connection.
 *
 * Applies performance pragmas:
 * - journal_mode=WAL (concurrent read/write)
 * - synchronous=NORMAL (durability/performance balance)
 * - busy_timeout=5000 (5s wait on locks)
 */
export function createDb(options: CreateDbOptions = {}): SqliteDb {
  const dbPath = options.databasePath ?? process.env['RUNWATCH_DB_PATH'] ?? './runwatch.db';
  if (dbPath !== ':memory:') mkdirSync(dirname(dbPath), { recursive: true });
  const sqlite = new Database(dbPath);

  sqlite.pragma('journal_mode = WAL');
  sqlite.pragma('synchronous = NORMAL');
  sqlite.pragma('busy_timeout = 5000');

  return drizzle(sqlite, { schema });
}

/**
 * Create an in-memory SQLite database for testing.
 */
export function createTestDb(): SqliteDb {
  return createDb({ databasePath: ':memory:' });
}
