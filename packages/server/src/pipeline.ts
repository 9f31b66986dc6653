/**
 * Pipeline wiring — the stores, lock and agents shared by every monitored
 * job, and a factory for per-job orchestrators.
 */

import { ulid } from 'ulid';
import type { RunwatchConfig } from './config.js';
import { createDb, type SqliteDb } from './db/index.js';
import { runMigrations } from './db/migrate.js';
import { RetrievalStore } from './db/retrieval-store.js';
import { createEmbeddingService, type EmbeddingService } from './lib/embeddings/index.js';
import { createLLMProvider } from './lib/llm/llm-client.js';
import type { LLMProvider } from './lib/llm/providers/types.js';
import { FailureReasoningAgent } from './lib/agents/failure-reasoning-agent.js';
import { LogPatternAgent } from './lib/agents/log-pattern-agent.js';
import { RuleStore } from './lib/rules/rule-store.js';
import { WriteLock } from './lib/rules/write-lock.js';
import { Orchestrator } from './lib/orchestrator/orchestrator.js';
import { createLogger } from './lib/logger.js';

const log = createLogger('Pipeline');

export interface PipelineOverrides {
  /** Reasoning provider; null disables reasoning */
  provider?: LLMProvider | null;
  /** Pattern provider; defaults to the reasoning provider */
  patternProvider?: LLMProvider | null;
  embeddings?: EmbeddingService;
  db?: SqliteDb;
  sleep?: (ms: number) => Promise<void>;
}

export interface Pipeline {
  readonly config: RunwatchConfig;
  readonly rules: RuleStore;
  readonly retrieval: RetrievalStore;
  readonly lock: WriteLock;
  /** A fresh orchestrator with its own filter buffer */
  createOrchestrator(jobId?: string): Orchestrator;
  /**
   * The long-lived orchestrator for a job, created on first use. At most
   * `config.maxJobs` are kept; the least recently used one is dropped.
   */
  orchestratorFor(jobId: string): Orchestrator;
  /** Job ids with a live orchestrator, least recently used first */
  activeJobs(): string[];
  /** Clear both rule collections and the retrieval store */
  reset(): Promise<void>;
}

function resolveProviders(
  config: RunwatchConfig,
  overrides: PipelineOverrides,
): { provider: LLMProvider | null; patternProvider: LLMProvider | null } {
  const provider =
    overrides.provider !== undefined ? overrides.provider : config.llm ? createLLMProvider(config.llm) : null;

  let patternProvider = provider;
  if (overrides.patternProvider !== undefined) {
    patternProvider = overrides.patternProvider;
  } else if (config.llm && config.patternModel && overrides.provider === undefined) {
    patternProvider = createLLMProvider({ ...config.llm, model: config.patternModel });
  }
  return { provider, patternProvider };
}

export function createPipeline(config: RunwatchConfig, overrides: PipelineOverrides = {}): Pipeline {
  const rules = new RuleStore(config.rulesDir);
  rules.load();

  const db = overrides.db ?? createDb({ databasePath: config.dbPath });
  runMigrations(db);

  const embeddings =
    overrides.embeddings ??
    createEmbeddingService({
      backend: config.embeddingBackend,
      modelName: config.embeddingModel,
      openaiApiKey: config.openaiApiKey,
    });
  const retrieval = new RetrievalStore(db, embeddings);
  const lock = new WriteLock();

  const { provider, patternProvider } = resolveProviders(config, overrides);
  const reasoner = provider
    ? new FailureReasoningAgent({
        provider,
        retriever: retrieval,
        retrievalK: config.retrievalK,
        parseRetries: config.parseRetries,
        samples: config.selfConsistency,
        timeoutMs: config.llmTimeoutMs,
      })
    : null;
  const patternAgent = patternProvider
    ? new LogPatternAgent({
        provider: patternProvider,
        samples: config.patternSelfConsistency,
        timeoutMs: config.llmTimeoutMs,
      })
    : null;

  log.info('Pipeline ready', {
    provider: provider ? `${provider.name}/${provider.model}` : null,
    embeddings: embeddings.modelName,
    filterRules: rules.filterRules.length,
    diagnosisRules: rules.diagnosisRules.length,
    failureRecords: retrieval.count(),
  });

  const orchestrators = new Map<string, Orchestrator>();

  const createOrchestrator = (jobId: string = ulid()): Orchestrator =>
    new Orchestrator({
      jobId,
      rules,
      retrieval,
      reasoner,
      patternAgent,
      lock,
      sleep: overrides.sleep,
      options: {
        bufferSize: config.filterBufferSize,
        failureIndicator: config.failureIndicator,
        patternIntervalChunks: config.patternIntervalChunks,
        reasoningRetries: config.reasoningRetries,
        retryBaseDelayMs: config.retryBaseDelayMs,
      },
    });

  return {
    config,
    rules,
    retrieval,
    lock,
    createOrchestrator,
    orchestratorFor(jobId: string): Orchestrator {
      let orchestrator = orchestrators.get(jobId);
      if (orchestrator) {
        // Map keeps insertion order; re-inserting marks the job most recently used
        orchestrators.delete(jobId);
      } else {
        orchestrator = createOrchestrator(jobId);
      }
      orchestrators.set(jobId, orchestrator);

      while (orchestrators.size > config.maxJobs) {
        const oldest = orchestrators.keys().next();
        if (oldest.done) break;
        orchestrators.delete(oldest.value);
        log.info('Dropped idle job orchestrator', { jobId: oldest.value, maxJobs: config.maxJobs });
      }
      return orchestrator;
    },
    activeJobs(): string[] {
      return [...orchestrators.keys()];
    },
    reset(): Promise<void> {
      return lock.runExclusive(() => {
        rules.reset();
        retrieval.reset();
      });
    },
  };
}
