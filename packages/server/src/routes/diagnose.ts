/**
 * Diagnose REST Endpoint
 *
 * POST /api/diagnose { line, jobId? } — push one log line through a job's
 * orchestrator and return the filter decision plus any diagnosis.
 */

import { Hono } from 'hono';
import { diagnoseRequestSchema, type DiagnoseRequest } from '@runwatch/core';
import type { Pipeline } from '../pipeline.js';
import { validateBody, type ValidatedVariables } from '../middleware/validation.js';
import { diagnoseRateLimit, type RateLimitOptions } from '../middleware/rate-limit.js';

export const DEFAULT_JOB_ID = 'default';

export function diagnoseRoutes(pipeline: Pipeline, rateLimit: RateLimitOptions = {}) {
  const app = new Hono<{ Variables: ValidatedVariables<DiagnoseRequest> }>();

  app.post('/', diagnoseRateLimit(rateLimit), validateBody(diagnoseRequestSchema), async (c) => {
    const { line, jobId = DEFAULT_JOB_ID } = c.get('validatedBody');
    const result = await pipeline.orchestratorFor(jobId).processLine(line);
    return c.json({ jobId, decision: result.decision, outcome: result.outcome });
  });

  return app;
}
