/**
 * Rule REST Endpoints
 *
 * GET /api/rules/filter    — learned filter rules, oldest first
 * GET /api/rules/diagnosis — learned diagnosis rules, oldest first
 * GET /api/rules/diagnosis/:id
 */

import { Hono } from 'hono';
import type { Pipeline } from '../pipeline.js';
import { ClientError } from '../lib/error-sanitizer.js';

export function rulesRoutes(pipeline: Pipeline) {
  const app = new Hono();

  app.get('/filter', (c) => {
    const rules = pipeline.rules.filterRules;
    return c.json({ rules, total: rules.length });
  });

  app.get('/diagnosis', (c) => {
    const rules = pipeline.rules.diagnosisRules;
    return c.json({ rules, total: rules.length });
  });

  app.get('/diagnosis/:id', (c) => {
    const rule = pipeline.rules.findDiagnosisRule(c.req.param('id'));
    if (!rule) throw new ClientError(404, 'Diagnosis rule not found');
    return c.json(rule);
  });

  return app;
}
