/**
 * Database migration runner.
 *
 * CREATE TABLE IF NOT EXISTS gives load-or-create on every start.
 */

import { sql } from 'drizzle-orm';
import type { SqliteDb } from './index.js';

export function runMigrations(db: SqliteDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS failure_records (
      seq INTEGER PRIMARY KEY AUTOINCREMENT,
      id TEXT NOT NULL UNIQUE,
      job_id TEXT,
      content_hash TEXT NOT NULL,
      text_content TEXT NOT NULL,
      record TEXT NOT NULL,
      embedding BLOB NOT NULL,
      embedding_model TEXT NOT NULL,
      dimensions INTEGER NOT NULL,
      created_at TEXT NOT NULL
    )
  `);

  db.run(sql`CREATE INDEX IF NOT EXISTS idx_failure_records_content_hash ON failure_records(content_hash)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS idx_failure_records_job ON failure_records(job_id)`);
}
