/**
 * GET /api/health — liveness plus store sizes
 */

import { Hono } from 'hono';
import type { Pipeline } from '../pipeline.js';

export function healthRoutes(pipeline: Pipeline) {
  const app = new Hono();

  app.get('/', (c) =>
    c.json({
      status: 'ok',
      filterRules: pipeline.rules.filterRules.length,
      diagnosisRules: pipeline.rules.diagnosisRules.length,
      failureRecords: pipeline.retrieval.count(),
      activeJobs: pipeline.activeJobs().length,
    }),
  );

  return app;
}
