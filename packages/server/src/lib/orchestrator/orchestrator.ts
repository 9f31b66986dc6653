/**
 * Orchestrator — drives one job's log stream through the pipeline.
 *
 *   idle → streaming → {filtering, diagnosing, reasoning, learning} → streaming → idle
 *
 * Lines are handled strictly in arrival order. Several orchestrators may
 * share the rule and retrieval stores; their Learning transitions are
 * serialized by the shared WriteLock.
 */

import { EventEmitter } from 'node:events';
import {
  FALLBACK_TEMPLATE,
  getErrorMessage,
  isRetryable,
  type DiagnosisOutcome,
  type DiagnosisTier,
  type FailureRecord,
  type FilterDecision,
  type FilterRule,
  type LogLine,
} from '@runwatch/core';
import { LogFilter } from '../filter/log-filter.js';
import { RuleDiagnoser } from '../diagnosis/rule-diagnoser.js';
import { advise } from '../recovery/recovery-advisor.js';
import type { RuleStore } from '../rules/rule-store.js';
import { WriteLock } from '../rules/write-lock.js';
import type { ReasonOptions, ReasoningResult } from '../agents/failure-reasoning-agent.js';
import type { InsertOptions, InsertResult } from '../../db/retrieval-store.js';
import { createLogger } from '../logger.js';
import { toLogLine } from './log-source.js';

const log = createLogger('Orchestrator');

export type OrchestratorState = 'idle' | 'streaming' | 'filtering' | 'diagnosing' | 'reasoning' | 'learning';

// ─── Collaborators ───────────────────────────────────────────────

export interface FailureReasoner {
  reason(line: string, opts?: ReasonOptions): Promise<ReasoningResult>;
}

export interface PatternSynthesizer {
  synthesize(lines: readonly LogLine[]): Promise<FilterRule | null>;
}

export interface FailureIndex {
  insert(text: string, record: FailureRecord, opts?: InsertOptions): Promise<InsertResult>;
}

export interface OrchestratorOptions {
  /** Unfiltered buffer capacity (default 50) */
  bufferSize?: number;
  failureIndicator?: string;
  /** Chunks between pattern synthesis runs (default 1) */
  patternIntervalChunks?: number;
  /** Retries after a transient reasoning failure (default 2) */
  reasoningRetries?: number;
  retryBaseDelayMs?: number;
  /** Escalated lines passed to the reasoner as context (default 5) */
  contextLines?: number;
}

export interface OrchestratorDeps {
  jobId: string;
  rules: RuleStore;
  retrieval: FailureIndex;
  /** null when no model is configured: every rule miss gets the fallback diagnosis */
  reasoner: FailureReasoner | null;
  patternAgent: PatternSynthesizer | null;
  lock: WriteLock;
  options?: OrchestratorOptions;
  sleep?: (ms: number) => Promise<void>;
}

// ─── Events and results ──────────────────────────────────────────

export interface StateChange {
  jobId: string;
  from: OrchestratorState;
  to: OrchestratorState;
}

export interface RuleLearned {
  jobId: string;
  kind: 'filter' | 'diagnosis';
  ruleId: string;
  pattern: string;
}

export interface OrchestratorEventMap {
  state: StateChange;
  diagnosis: DiagnosisOutcome;
  rule: RuleLearned;
}

export interface RunSummary {
  jobId: string;
  chunks: number;
  lines: number;
  suppressed: number;
  /** Escalated lines that were not failures */
  unfiltered: number;
  failures: number;
  byTier: Record<DiagnosisTier, number>;
  filterRulesLearned: number;
  diagnosisRulesLearned: number;
  outcomes: DiagnosisOutcome[];
}

export interface LineResult {
  decision: FilterDecision;
  outcome: DiagnosisOutcome | null;
}

function emptySummary(jobId: string): RunSummary {
  return {
    jobId,
    chunks: 0,
    lines: 0,
    suppressed: 0,
    unfiltered: 0,
    failures: 0,
    byTier: { rule: 0, reasoning: 0, fallback: 0 },
    filterRulesLearned: 0,
    diagnosisRulesLearned: 0,
    outcomes: [],
  };
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export class Orchestrator {
  readonly jobId: string;
  private readonly emitter = new EventEmitter();
  private readonly filter: LogFilter;
  private readonly diagnoser: RuleDiagnoser;
  private readonly rules: RuleStore;
  private readonly retrieval: FailureIndex;
  private readonly reasoner: FailureReasoner | null;
  private readonly patternAgent: PatternSynthesizer | null;
  private readonly lock: WriteLock;
  /** Serializes this job's lines across run() and processLine() */
  private readonly sequencer = new WriteLock();
  private readonly sleep: (ms: number) => Promise<void>;

  private readonly patternIntervalChunks: number;
  private readonly reasoningRetries: number;
  private readonly retryBaseDelayMs: number;
  private readonly contextLines: number;

  private currentState: OrchestratorState = 'idle';
  private summary: RunSummary;
  private recent: string[] = [];
  private chunkIndex = 0;
  private lineIndex = 0;
  private chunksSincePatternRun = 0;

  constructor(deps: OrchestratorDeps) {
    const opts = deps.options ?? {};
    this.jobId = deps.jobId;
    this.rules = deps.rules;
    this.retrieval = deps.retrieval;
    this.reasoner = deps.reasoner;
    this.patternAgent = deps.patternAgent;
    this.lock = deps.lock;
    this.sleep = deps.sleep ?? defaultSleep;
    this.filter = new LogFilter(deps.rules, {
      bufferSize: opts.bufferSize,
      failureIndicator: opts.failureIndicator,
    });
    this.diagnoser = new RuleDiagnoser(deps.rules);
    this.patternIntervalChunks = opts.patternIntervalChunks ?? 1;
    this.reasoningRetries = opts.reasoningRetries ?? 2;
    this.retryBaseDelayMs = opts.retryBaseDelayMs ?? 500;
    this.contextLines = opts.contextLines ?? 5;
    this.summary = emptySummary(this.jobId);
  }

  get state(): OrchestratorState {
    return this.currentState;
  }

  /** Lines waiting for pattern synthesis */
  get bufferedLines(): readonly LogLine[] {
    return this.filter.bufferedLines;
  }

  on<K extends keyof OrchestratorEventMap>(event: K, listener: (payload: OrchestratorEventMap[K]) => void): this {
    this.emitter.on(event, listener);
    return this;
  }

  off<K extends keyof OrchestratorEventMap>(event: K, listener: (payload: OrchestratorEventMap[K]) => void): this {
    this.emitter.off(event, listener);
    return this;
  }

  /**
   * Process a whole stream of chunks, then run a final pattern synthesis
   * and flush the rule store.
   */
  run(chunks: AsyncIterable<string[]> | Iterable<string[]>): Promise<RunSummary> {
    return this.sequencer.runExclusive(async () => {
      this.summary = emptySummary(this.jobId);
      this.transition('streaming');
      try {
        for await (const chunk of chunks) {
          for (const text of chunk) {
            await this.handleLine(text);
          }
          this.chunkIndex++;
          this.summary.chunks++;
          this.chunksSincePatternRun++;
          if (this.chunksSincePatternRun >= this.patternIntervalChunks) {
            await this.learnPatterns();
          }
        }
        if (this.filter.bufferedLines.length > 0) await this.learnPatterns();
        await this.flush();
      } finally {
        this.transition('idle');
      }

      log.info('Stream finished', {
        jobId: this.jobId,
        lines: this.summary.lines,
        failures: this.summary.failures,
        byTier: this.summary.byTier,
      });
      return this.summary;
    });
  }

  /** Run a single line through the pipeline (HTTP API entry point) */
  processLine(text: string): Promise<LineResult> {
    return this.sequencer.runExclusive(async () => {
      this.transition('streaming');
      try {
        const result = await this.handleLine(text);
        const ruleHit =
          (result.decision.kind === 'suppressed' && result.decision.ruleId !== null) || result.outcome?.tier === 'rule';
        if (ruleHit) await this.flush();
        return result;
      } finally {
        this.transition('idle');
      }
    });
  }

  // ─── Per-line flow ─────────────────────────────────────────────

  private async handleLine(text: string): Promise<LineResult> {
    this.transition('filtering');
    const line = toLogLine(text, this.chunkIndex, this.lineIndex++);
    this.summary.lines++;
    const decision = this.filter.classify(line);

    let outcome: DiagnosisOutcome | null = null;
    if (decision.kind === 'suppressed') {
      this.summary.suppressed++;
    } else {
      if (decision.failureCandidate) {
        outcome = await this.diagnose(line);
      } else {
        this.summary.unfiltered++;
      }
      this.remember(line.text);
    }

    this.transition('streaming');
    if (this.filter.isBufferFull) await this.learnPatterns();
    return { decision, outcome };
  }

  private async diagnose(line: LogLine): Promise<DiagnosisOutcome> {
    this.transition('diagnosing');
    const ruleRecord = this.diagnoser.diagnose(line.text);
    if (ruleRecord) return this.deliver(line, ruleRecord, 'rule', null, 0);

    if (!this.reasoner) {
      log.warn('No reasoner configured, using fallback diagnosis', { jobId: this.jobId, line: line.lineIndex });
      return this.deliver(line, fallbackRecord(), 'fallback', null, 0);
    }

    this.transition('reasoning');
    let result: ReasoningResult;
    try {
      result = await this.reasonWithRetry(this.reasoner, line.text);
    } catch (err: unknown) {
      log.error('Reasoning failed, using fallback diagnosis', {
        jobId: this.jobId,
        line: line.lineIndex,
        error: getErrorMessage(err),
      });
      return this.deliver(line, fallbackRecord(), 'fallback', null, 0);
    }

    this.transition('learning');
    const learnedRuleId = await this.learnDiagnosis(line, result);
    return this.deliver(line, result.record, 'reasoning', learnedRuleId, result.retrieved.length);
  }

  private async reasonWithRetry(reasoner: FailureReasoner, text: string): Promise<ReasoningResult> {
    const recentContext = [...this.recent];
    for (let attempt = 0; ; attempt++) {
      try {
        return await reasoner.reason(text, { recentContext });
      } catch (err: unknown) {
        if (!isRetryable(err) || attempt >= this.reasoningRetries) throw err;
        const delay = this.retryBaseDelayMs * 2 ** attempt;
        log.warn('Transient reasoning failure, retrying', {
          jobId: this.jobId,
          attempt: attempt + 1,
          delayMs: delay,
          error: getErrorMessage(err),
        });
        await this.sleep(delay);
      }
    }
  }

  private deliver(
    line: LogLine,
    record: FailureRecord,
    tier: DiagnosisTier,
    learnedRuleId: string | null,
    retrievedCount: number,
  ): DiagnosisOutcome {
    const outcome: DiagnosisOutcome = {
      jobId: this.jobId,
      line,
      record,
      action: advise(record),
      tier,
      learnedRuleId,
      retrievedCount,
    };
    this.summary.failures++;
    this.summary.byTier[tier]++;
    this.summary.outcomes.push(outcome);
    this.emitter.emit('diagnosis', outcome);
    return outcome;
  }

  private remember(text: string): void {
    if (this.contextLines === 0) return;
    this.recent.push(text);
    if (this.recent.length > this.contextLines) this.recent.shift();
  }

  // ─── Learning ──────────────────────────────────────────────────

  /** Persist the candidate rule and index the record. Errors are logged, never thrown. */
  private learnDiagnosis(line: LogLine, result: ReasoningResult): Promise<string | null> {
    return this.lock.runExclusive(async () => {
      let learnedRuleId: string | null = null;
      if (result.candidateRule) {
        try {
          const { added, rule } = this.rules.appendDiagnosisRule(result.candidateRule);
          if (added) {
            this.rules.save();
            this.summary.diagnosisRulesLearned++;
            this.emitter.emit('rule', { jobId: this.jobId, kind: 'diagnosis', ruleId: rule.id, pattern: rule.pattern });
          }
          // only reported once the rule is on disk
          learnedRuleId = rule.id;
        } catch (err: unknown) {
          log.error('Failed to persist diagnosis rule', { jobId: this.jobId, error: getErrorMessage(err) });
        }
      }

      try {
        await this.retrieval.insert(line.text, result.record, { jobId: this.jobId });
      } catch (err: unknown) {
        log.error('Failed to index failure record', { jobId: this.jobId, error: getErrorMessage(err) });
      }
      return learnedRuleId;
    });
  }

  private async learnPatterns(): Promise<void> {
    this.chunksSincePatternRun = 0;
    const lines = this.filter.drainBuffer();
    if (lines.length === 0 || !this.patternAgent) return;

    const previous = this.currentState;
    const rule = await this.patternAgent.synthesize(lines);
    if (!rule) return;

    this.transition('learning');
    await this.lock.runExclusive(() => {
      try {
        const { added, rule: stored } = this.rules.appendFilterRule(rule);
        if (!added) return;
        this.rules.save();
        this.summary.filterRulesLearned++;
        this.emitter.emit('rule', { jobId: this.jobId, kind: 'filter', ruleId: stored.id, pattern: stored.pattern });
      } catch (err: unknown) {
        log.error('Failed to persist filter rule', { jobId: this.jobId, error: getErrorMessage(err) });
      }
    });
    this.transition(previous);
  }

  /** Persist hit and match counts */
  private flush(): Promise<void> {
    return this.lock.runExclusive(() => {
      try {
        this.rules.save();
      } catch (err: unknown) {
        log.error('Failed to flush rule store', { jobId: this.jobId, error: getErrorMessage(err) });
      }
    });
  }

  private transition(to: OrchestratorState): void {
    const from = this.currentState;
    if (from === to) return;
    this.currentState = to;
    log.debug('State change', { jobId: this.jobId, from, to });
    this.emitter.emit('state', { jobId: this.jobId, from, to });
  }
}

function fallbackRecord(): FailureRecord {
  return { ...FALLBACK_TEMPLATE, provenance: 'llm_generated', originatingRuleId: null };
}
