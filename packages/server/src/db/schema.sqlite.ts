/**
 * SQLite schema for the retrieval store — defined with Drizzle ORM.
 */

import { sqliteTable, text, integer, blob, index } from 'drizzle-orm/sqlite-core';

// ─── Failure Records Table ─────────────────────────────────
export const failureRecords = sqliteTable(
  'failure_records',
  {
    seq: integer('seq').primaryKey({ autoIncrement: true }), // insertion order
    id: text('id').notNull().unique(), // ULID
    jobId: text('job_id'),
    contentHash: text('content_hash').notNull(), // SHA-256 of the failure text
    textContent: text('text_content').notNull(),
    record: text('record').notNull(), // JSON FailureRecord
    embedding: blob('embedding', { mode: 'buffer' }).notNull(), // Float32Array as binary
    embeddingModel: text('embedding_model').notNull(),
    dimensions: integer('dimensions').notNull(),
    createdAt: text('created_at').notNull(),
  },
  (table) => [
    index('idx_failure_records_content_hash').on(table.contentHash),
    index('idx_failure_records_job').on(table.jobId),
  ],
);
