/**
 * Failure Retrieval Endpoint
 *
 * GET /api/failures/search?q=...&k=3 — nearest past failures by similarity
 */

import { Hono } from 'hono';
import type { Pipeline } from '../pipeline.js';
import { ClientError } from '../lib/error-sanitizer.js';

const MAX_K = 50;

export function failuresRoutes(pipeline: Pipeline) {
  const app = new Hono();

  app.get('/search', async (c) => {
    const q = c.req.query('q')?.trim();
    if (!q) throw new ClientError(400, 'Query parameter q is required');

    const kStr = c.req.query('k');
    const k = kStr === undefined ? pipeline.config.retrievalK : parseInt(kStr, 10);
    if (isNaN(k) || k < 1 || k > MAX_K) {
      throw new ClientError(400, `k must be between 1 and ${MAX_K}`);
    }

    const matches = await pipeline.retrieval.search(q, k);
    return c.json({ query: q, k, matches, total: pipeline.retrieval.count() });
  });

  return app;
}
