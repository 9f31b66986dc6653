/**
 * Retrieval Context Store — vector index over past failure records.
 *
 * Vectors are stored as Float32 BLOBs; similarity is computed in JS
 * (SQLite has no vector ops). Insertion order is the autoincrement seq.
 */

import { createHash } from 'node:crypto';
import { asc, count, eq, sql } from 'drizzle-orm';
import { ulid } from 'ulid';
import {
  PersistenceError,
  failureRecordSchema,
  getErrorMessage,
  type FailureRecord,
  type RetrievalMatch,
} from '@runwatch/core';
import type { SqliteDb } from './index.js';
import { failureRecords } from './schema.sqlite.js';
import { cosineSimilarity, type EmbeddingService } from '../lib/embeddings/index.js';
import { createLogger } from '../lib/logger.js';

const log = createLogger('RetrievalStore');

/** Compute SHA-256 content hash of text */
function contentHash(text: string): string {
  return createHash('sha256').update(text).digest('hex');
}

/** Serialize Float32Array to Buffer for SQLite BLOB storage */
function serializeEmbedding(embedding: Float32Array): Buffer {
  return Buffer.from(embedding.buffer.slice(embedding.byteOffset, embedding.byteOffset + embedding.byteLength));
}

/** Deserialize Buffer from SQLite BLOB to Float32Array */
function deserializeEmbedding(blob: Buffer): Float32Array {
  // Copy to fresh aligned buffer — Buffer from SQLite may have non-4-byte-aligned offset
  const copy = new Uint8Array(blob).buffer;
  return new Float32Array(copy);
}

function parseRecord(raw: string): FailureRecord | null {
  try {
    const parsed = failureRecordSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export interface InsertOptions {
  jobId?: string;
}

export interface InsertResult {
  id: string;
  /** False when the same text was already indexed */
  inserted: boolean;
}

export class RetrievalStore {
  constructor(
    private readonly db: SqliteDb,
    private readonly embeddings: EmbeddingService,
  ) {}

  /**
   * Embed and index a failure. Identical text is stored once.
   *
   * @throws TransientReasoningError if the embedding backend fails
   * @throws PersistenceError if the row cannot be written
   */
  async insert(text: string, record: FailureRecord, opts: InsertOptions = {}): Promise<InsertResult> {
    const hash = contentHash(text);
    const existing = this.db
      .select({ id: failureRecords.id })
      .from(failureRecords)
      .where(eq(failureRecords.contentHash, hash))
      .get();
    if (existing) return { id: existing.id, inserted: false };

    const vector = await this.embeddings.embed(text);
    const id = ulid();
    try {
      this.db
        .insert(failureRecords)
        .values({
          id,
          jobId: opts.jobId ?? null,
          contentHash: hash,
          textContent: text,
          record: JSON.stringify(record),
          embedding: serializeEmbedding(vector),
          embeddingModel: this.embeddings.modelName,
          dimensions: vector.length,
          createdAt: new Date().toISOString(),
        })
        .run();
    } catch (err: unknown) {
      throw new PersistenceError(`Cannot index failure record: ${getErrorMessage(err)}`, err);
    }
    log.debug('Indexed failure record', { id, jobId: opts.jobId });
    return { id, inserted: true };
  }

  /**
   * The k most similar past failures, best first; equal scores keep insertion order.
   * Rows embedded at a different width are skipped.
   *
   * @throws TransientReasoningError if the embedding backend fails
   */
  async search(queryText: string, k: number): Promise<RetrievalMatch[]> {
    if (k <= 0 || this.count() === 0) return [];

    const query = await this.embeddings.embed(queryText);
    const rows = this.db
      .select()
      .from(failureRecords)
      .where(eq(failureRecords.dimensions, query.length))
      .orderBy(asc(failureRecords.seq))
      .all();

    const matches: RetrievalMatch[] = [];
    for (const row of rows) {
      const record = parseRecord(row.record);
      if (!record) {
        log.warn('Skipping unreadable failure record', { id: row.id });
        continue;
      }
      matches.push({
        id: row.id,
        text: row.textContent,
        record,
        score: cosineSimilarity(query, deserializeEmbedding(row.embedding)),
        seq: row.seq,
      });
    }

    matches.sort((a, b) => b.score - a.score || a.seq - b.seq);
    return matches.slice(0, k);
  }

  count(): number {
    const row = this.db.select({ value: count() }).from(failureRecords).get();
    return row?.value ?? 0;
  }

  /** Delete every indexed failure */
  reset(): void {
    try {
      this.db.run(sql`DELETE FROM failure_records`);
    } catch (err: unknown) {
      throw new PersistenceError(`Cannot reset retrieval store: ${getErrorMessage(err)}`, err);
    }
    log.info('Retrieval store reset');
  }
}
