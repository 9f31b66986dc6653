/**
 * Tests for the HTTP API, driven through app.request with an in-memory pipeline.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { TransientReasoningError } from '@runwatch/core';
import { createApp, type AppOptions } from '../index.js';
import { createPipeline, type Pipeline } from '../pipeline.js';
import { createFilterRule } from '../lib/rules/rule-store.js';
import { diagnosisReply, muteLogs, scriptedProvider, testConfig } from './fakes.js';

const NCCL_3 = 'ERROR: NCCL timeout on rank 3';
const NCCL_7 = 'ERROR: NCCL timeout on rank 7';

describe('HTTP API', () => {
  let dir: string;
  let pipeline: Pipeline;

  beforeEach(() => {
    muteLogs();
    dir = mkdtempSync(join(tmpdir(), 'runwatch-api-'));
    pipeline = createPipeline(testConfig({ rulesDir: dir }), {
      provider: scriptedProvider([diagnosisReply()]),
      patternProvider: null,
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function app(opts: AppOptions = {}) {
    return createApp(pipeline, { requestLogging: false, ...opts });
  }

  function postLine(body: unknown, opts: AppOptions = {}) {
    return app(opts).request('/api/diagnose', {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  describe('GET /api/health', () => {
    it('reports store sizes', async () => {
      pipeline.rules.appendFilterRule(createFilterRule('^INFO: step \\d+'));

      const res = await app().request('/api/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        status: 'ok',
        filterRules: 1,
        diagnosisRules: 0,
        failureRecords: 0,
        activeJobs: 0,
      });
    });
  });

  describe('POST /api/diagnose', () => {
    it('diagnoses a novel failure by reasoning, then by rule', async () => {
      const first = await postLine({ line: NCCL_3, jobId: 'job-1' });
      expect(first.status).toBe(200);
      const firstBody = await first.json();
      expect(firstBody.jobId).toBe('job-1');
      expect(firstBody.decision.kind).toBe('escalated');
      expect(firstBody.decision.failureCandidate).toBe(true);
      expect(firstBody.outcome.tier).toBe('reasoning');
      expect(firstBody.outcome.record.errorType).toBe('nccl_timeout');

      const second = await postLine({ line: NCCL_7, jobId: 'job-1' });
      const secondBody = await second.json();
      expect(secondBody.outcome.tier).toBe('rule');
      expect(secondBody.outcome.record.originatingRuleId).toBe(pipeline.rules.diagnosisRules[0]!.id);
      expect(secondBody.outcome.action).toEqual({
        kind: 'auto_recoverable',
        description: 'Restart the job from the last checkpoint',
      });
    });

    it('uses the default job when none is given', async () => {
      const res = await postLine({ line: 'INFO: step 1 loss=2.31' });
      const body = await res.json();

      expect(body.jobId).toBe('default');
      expect(body.decision.kind).toBe('escalated');
      expect(body.decision.failureCandidate).toBe(false);
      expect(body.outcome).toBeNull();
    });

    it('reports suppression by a learned filter rule', async () => {
      const { rule } = pipeline.rules.appendFilterRule(createFilterRule('^INFO: step \\d+'));

      const res = await postLine({ line: 'INFO: step 12 loss=0.52' });
      const body = await res.json();

      expect(body.decision).toMatchObject({ kind: 'suppressed', ruleId: rule.id });
      expect(body.outcome).toBeNull();
    });

    it('rejects a missing line with 400', async () => {
      const res = await postLine({ jobId: 'job-1' });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toBe('Validation failed');
      expect(body.details[0].path).toBe('line');
    });

    it('rejects a body that is not JSON', async () => {
      const res = await app().request('/api/diagnose', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json',
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Invalid JSON body', status: 400 });
    });

    it('keeps only the most recently used job orchestrators', async () => {
      pipeline = createPipeline(testConfig({ rulesDir: dir, maxJobs: 2 }), {
        provider: null,
        patternProvider: null,
      });

      for (const jobId of ['job-a', 'job-b', 'job-a', 'job-c', 'job-d']) {
        expect((await postLine({ line: 'INFO: step 1', jobId })).status).toBe(200);
      }

      expect(pipeline.activeJobs()).toEqual(['job-c', 'job-d']);
      const health = await app().request('/api/health');
      expect((await health.json()).activeJobs).toBe(2);
    });

    it('returns 429 once the rate limit is spent', async () => {
      const limited = app({ rateLimit: { limit: 2, windowMs: 60_000 } });
      const send = () =>
        limited.request('/api/diagnose', {
          method: 'POST',
          headers: { 'Content-Type': 'application/json' },
          body: JSON.stringify({ line: 'INFO: warmup' }),
        });

      expect((await send()).status).toBe(200);
      expect((await send()).status).toBe(200);
      const res = await send();
      expect(res.status).toBe(429);
      expect(await res.json()).toEqual({ error: 'Too Many Requests', status: 429 });
    });
  });

  describe('GET /api/rules', () => {
    it('lists learned rules in insertion order', async () => {
      const a = pipeline.rules.appendFilterRule(createFilterRule('^INFO: step \\d+')).rule;
      const b = pipeline.rules.appendFilterRule(createFilterRule('^DEBUG: ')).rule;

      const res = await app().request('/api/rules/filter');
      const body = await res.json();

      expect(body.total).toBe(2);
      expect(body.rules.map((r: { id: string }) => r.id)).toEqual([a.id, b.id]);
    });

    it('lists diagnosis rules learned through the API', async () => {
      await postLine({ line: NCCL_3 });

      const res = await app().request('/api/rules/diagnosis');
      const body = await res.json();

      expect(body.total).toBe(1);
      expect(body.rules[0].pattern).toBe('NCCL timeout on rank \\d+');
      expect(body.rules[0].template.errorType).toBe('nccl_timeout');
    });

    it('returns 404 for an unknown diagnosis rule', async () => {
      const res = await app().request('/api/rules/diagnosis/nope');

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: 'Diagnosis rule not found', status: 404 });
    });
  });

  describe('GET /api/failures/search', () => {
    it('finds indexed failures', async () => {
      await postLine({ line: NCCL_3 });

      const res = await app().request('/api/failures/search?q=NCCL%20timeout%20on%20rank%205&k=2');
      const body = await res.json();

      expect(res.status).toBe(200);
      expect(body.k).toBe(2);
      expect(body.total).toBe(1);
      expect(body.matches).toHaveLength(1);
      expect(body.matches[0].text).toBe(NCCL_3);
      expect(body.matches[0].record.errorType).toBe('nccl_timeout');
    });

    it('returns an empty list for an empty store', async () => {
      const res = await app().request('/api/failures/search?q=anything');
      const body = await res.json();

      expect(body.k).toBe(3);
      expect(body.matches).toEqual([]);
    });

    it('requires q', async () => {
      const res = await app().request('/api/failures/search');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'Query parameter q is required', status: 400 });
    });

    it('rejects k outside 1..50', async () => {
      const res = await app().request('/api/failures/search?q=x&k=0');

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: 'k must be between 1 and 50', status: 400 });
    });

    it('hides internal error details', async () => {
      vi.spyOn(pipeline.retrieval, 'search').mockRejectedValue(new Error('SQLITE_BUSY: database is locked'));

      const res = await app().request('/api/failures/search?q=x');

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({ error: 'Internal server error', status: 500 });
    });

    it('maps an unavailable embedding backend to 503', async () => {
      vi.spyOn(pipeline.retrieval, 'search').mockRejectedValue(new TransientReasoningError('embedding request failed'));

      const res = await app().request('/api/failures/search?q=x');

      expect(res.status).toBe(503);
      expect(await res.json()).toEqual({ error: 'Upstream model unavailable', status: 503 });
    });
  });

  it('returns JSON 404 for unknown routes', async () => {
    const res = await app().request('/api/nope');

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: 'Not found', status: 404 });
  });
});
