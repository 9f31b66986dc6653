/**
 * Runtime configuration — reads from environment variables with sensible defaults.
 */

import {
  ConfigurationError,
  DEFAULT_CHUNK_SIZE,
  DEFAULT_FAILURE_INDICATOR,
  DEFAULT_FILTER_BUFFER_SIZE,
  DEFAULT_MAX_JOBS,
  DEFAULT_RETRIEVAL_K,
  tryCompilePattern,
} from '@runwatch/core';
import { createLogger } from './lib/logger.js';
import { getLLMConfigFromEnv, type LLMConfig } from './lib/llm/llm-client.js';
import type { EmbeddingBackend } from './lib/embeddings/index.js';

const log = createLogger('Config');

export interface RunwatchConfig {
  /** Reasoning-agent LLM (null when RUNWATCH_LLM_API_KEY is unset) */
  llm: LLMConfig | null;
  /** Model override for the log pattern agent (default: llm.model) */
  patternModel?: string;
  /** Per-call timeout for model requests */
  llmTimeoutMs: number;

  embeddingBackend: EmbeddingBackend;
  embeddingModel?: string;
  openaiApiKey?: string;

  /** Directory holding filter_rules.json and diagnosis_rules.json */
  rulesDir: string;
  /** SQLite file for the retrieval store. Use ':memory:' for tests. */
  dbPath: string;

  chunkSize: number;
  filterBufferSize: number;
  /** Run pattern synthesis after every N chunks */
  patternIntervalChunks: number;
  /** Regex source marking a line as a failure candidate */
  failureIndicator: string;
  /** Live per-job orchestrators; the least recently used is dropped beyond this */
  maxJobs: number;

  retrievalK: number;
  /** Extra attempts on malformed model output */
  parseRetries: number;
  /** Extra attempts on transient model failures */
  reasoningRetries: number;
  retryBaseDelayMs: number;
  /** Reasoning samples per failure; 1 disables self-consistency */
  selfConsistency: number;
  /** Pattern-agent samples per synthesis */
  patternSelfConsistency: number;

  port: number;
  corsOrigin: string;
}

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (isNaN(parsed)) {
    log.warn(`Ignoring non-numeric ${name}=${raw}; using ${fallback}`);
    return fallback;
  }
  return parsed;
}

/**
 * Read configuration from environment variables.
 */
export function getConfig(): RunwatchConfig {
  const backend = process.env['RUNWATCH_EMBEDDING_BACKEND'] ?? 'hashing';
  if (backend !== 'hashing' && backend !== 'openai') {
    throw new ConfigurationError(
      `Invalid RUNWATCH_EMBEDDING_BACKEND: '${backend}'. Expected 'hashing' or 'openai'.`,
    );
  }

  return {
    llm: getLLMConfigFromEnv(),
    patternModel: process.env['RUNWATCH_PATTERN_LLM_MODEL'] || undefined,
    llmTimeoutMs: intFromEnv('RUNWATCH_LLM_TIMEOUT_MS', 60_000),

    embeddingBackend: backend,
    embeddingModel: process.env['RUNWATCH_EMBEDDING_MODEL'] || undefined,
    openaiApiKey: process.env['OPENAI_API_KEY'] || undefined,

    rulesDir: process.env['RUNWATCH_RULES_DIR'] ?? './rules',
    dbPath: process.env['RUNWATCH_DB_PATH'] ?? './runwatch.db',

    chunkSize: intFromEnv('RUNWATCH_CHUNK_SIZE', DEFAULT_CHUNK_SIZE),
    filterBufferSize: intFromEnv('RUNWATCH_FILTER_BUFFER_SIZE', DEFAULT_FILTER_BUFFER_SIZE),
    patternIntervalChunks: intFromEnv('RUNWATCH_PATTERN_INTERVAL_CHUNKS', 1),
    failureIndicator: process.env['RUNWATCH_FAILURE_INDICATOR'] || DEFAULT_FAILURE_INDICATOR,
    maxJobs: intFromEnv('RUNWATCH_MAX_JOBS', DEFAULT_MAX_JOBS),

    retrievalK: intFromEnv('RUNWATCH_RETRIEVAL_K', DEFAULT_RETRIEVAL_K),
    parseRetries: intFromEnv('RUNWATCH_PARSE_RETRIES', 2),
    reasoningRetries: intFromEnv('RUNWATCH_REASONING_RETRIES', 2),
    retryBaseDelayMs: intFromEnv('RUNWATCH_RETRY_BASE_DELAY_MS', 500),
    selfConsistency: intFromEnv('RUNWATCH_SELF_CONSISTENCY', 1),
    patternSelfConsistency: intFromEnv('RUNWATCH_PATTERN_SELF_CONSISTENCY', 3),

    port: intFromEnv('PORT', 3500),
    corsOrigin: process.env['CORS_ORIGIN'] ?? 'http://localhost:3500',
  };
}

export interface ValidateOptions {
  /** Fail when no LLM credentials are configured */
  requireLlm?: boolean;
}

/**
 * Validate config before any processing begins.
 * @throws ConfigurationError listing every problem found
 */
export function validateConfig(config: RunwatchConfig, opts: ValidateOptions = {}): void {
  const problems = listConfigProblems(config, opts);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`, problems);
  }
  if (!config.llm) {
    log.warn('RUNWATCH_LLM_API_KEY is not set — rule misses will degrade to manual investigation');
  }
}

/** Every configuration problem, in a stable order. Empty when valid. */
export function listConfigProblems(config: RunwatchConfig, opts: ValidateOptions = {}): string[] {
  const problems: string[] = [];

  if (opts.requireLlm && !config.llm) {
    problems.push('RUNWATCH_LLM_API_KEY is required');
  }
  if (config.embeddingBackend === 'openai' && !config.openaiApiKey) {
    problems.push('OPENAI_API_KEY is required for the openai embedding backend');
  }
  if (!config.rulesDir) problems.push('rules directory is empty');
  if (!config.dbPath) problems.push('database path is empty');

  const positive: Array<[string, number]> = [
    ['chunk size', config.chunkSize],
    ['filter buffer size', config.filterBufferSize],
    ['pattern interval', config.patternIntervalChunks],
    ['max jobs', config.maxJobs],
    ['retrieval k', config.retrievalK],
    ['LLM timeout', config.llmTimeoutMs],
    ['self-consistency samples', config.selfConsistency],
    ['pattern self-consistency samples', config.patternSelfConsistency],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) problems.push(`${name} must be a positive integer`);
  }
  if (config.parseRetries < 0) problems.push('parse retries must be >= 0');
  if (config.reasoningRetries < 0) problems.push('reasoning retries must be >= 0');
  if (config.retryBaseDelayMs < 0) problems.push('retry base delay must be >= 0');

  if (!tryCompilePattern(config.failureIndicator, 'i')) {
    problems.push(`failure indicator is not a valid regex: ${config.failureIndicator}`);
  }

  return problems;
}
