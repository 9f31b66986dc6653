/**
 * @runwatch/server — diagnosis pipeline and Hono HTTP API
 *
 * Exports:
 * - createApp(pipeline, opts?) — factory that returns a configured Hono app
 * - startServer(config?) — standalone entry point that wires the pipeline and starts listening
 * - the pipeline components the CLI drives directly
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';
import { getConfig, validateConfig, type RunwatchConfig } from './config.js';
import { createPipeline, type Pipeline, type PipelineOverrides } from './pipeline.js';
import { createLogger } from './lib/logger.js';
import { getErrorStatus, sanitizeErrorMessage } from './lib/error-sanitizer.js';
import type { RateLimitOptions } from './middleware/rate-limit.js';
import { apiBodyLimit } from './middleware/body-limit.js';
import { healthRoutes } from './routes/health.js';
import { rulesRoutes } from './routes/rules.js';
import { diagnoseRoutes } from './routes/diagnose.js';
import { failuresRoutes } from './routes/failures.js';

// Re-export everything consumers may need
export { getConfig, validateConfig, listConfigProblems } from './config.js';
export type { RunwatchConfig, ValidateOptions } from './config.js';
export { createPipeline } from './pipeline.js';
export type { Pipeline, PipelineOverrides } from './pipeline.js';
export { Orchestrator } from './lib/orchestrator/orchestrator.js';
export type {
  OrchestratorState,
  RunSummary,
  LineResult,
  StateChange,
  RuleLearned,
} from './lib/orchestrator/orchestrator.js';
export { readLogChunks, chunkLines, toLogLine } from './lib/orchestrator/log-source.js';
export { RuleStore } from './lib/rules/rule-store.js';
export { WriteLock } from './lib/rules/write-lock.js';
export { RetrievalStore } from './db/retrieval-store.js';
export { createLLMProvider } from './lib/llm/llm-client.js';
export type { LLMConfig, LLMProviderName } from './lib/llm/llm-client.js';
export type { LLMProvider, LLMCompletionRequest, LLMCompletionResponse } from './lib/llm/providers/types.js';
export { createEmbeddingService } from './lib/embeddings/index.js';
export type { EmbeddingService, EmbeddingBackend } from './lib/embeddings/index.js';
export { createLogger } from './lib/logger.js';
export type { Logger } from './lib/logger.js';
export { ClientError } from './lib/error-sanitizer.js';

const log = createLogger('Server');

export interface AppOptions {
  /** Limits for POST /api/diagnose */
  rateLimit?: RateLimitOptions;
  /** Request logging on /api/* (default true) */
  requestLogging?: boolean;
}

/**
 * Create a configured Hono app with all routes and middleware.
 */
export function createApp(pipeline: Pipeline, opts: AppOptions = {}) {
  const app = new Hono();

  // ─── Global error handler ──────────────────────────────
  app.onError((err, c) => {
    const status = getErrorStatus(err);
    if (status >= 500) {
      log.error('Unhandled error', { error: err.message, route: c.req.path });
    }
    return c.json({ error: sanitizeErrorMessage(err), status }, status as 500);
  });

  app.notFound((c) => c.json({ error: 'Not found', status: 404 }, 404));

  // ─── Middleware on /api/* ──────────────────────────────
  app.use('/api/*', cors({ origin: pipeline.config.corsOrigin }));
  if (opts.requestLogging ?? true) {
    app.use('/api/*', logger());
  }
  app.use('/api/*', apiBodyLimit);

  app.route('/api/health', healthRoutes(pipeline));
  app.route('/api/rules', rulesRoutes(pipeline));
  app.route('/api/diagnose', diagnoseRoutes(pipeline, opts.rateLimit));
  app.route('/api/failures', failuresRoutes(pipeline));

  return app;
}

/**
 * Start the server as a standalone process.
 * Validates configuration, loads rules, opens the retrieval store and starts listening.
 */
export function startServer(config: RunwatchConfig = getConfig(), pipelineOverrides: PipelineOverrides = {}) {
  validateConfig(config);

  const pipeline = createPipeline(config, pipelineOverrides);
  const app = createApp(pipeline);

  log.info('runwatch server starting', {
    port: config.port,
    corsOrigin: config.corsOrigin,
    rulesDir: config.rulesDir,
    database: config.dbPath,
  });

  const server = serve(
    {
      fetch: app.fetch,
      port: config.port,
    },
    (info) => {
      log.info(`runwatch server listening on http://localhost:${info.port}`);
    },
  );

  return { app, pipeline, server };
}
