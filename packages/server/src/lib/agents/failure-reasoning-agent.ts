/**
 * Failure Reasoning Agent — tier 2 diagnosis.
 *
 * Retrieves similar past failures, asks the model for a structured
 * diagnosis and proposes a candidate diagnosis rule. No persistence side
 * effects: the orchestrator decides what gets learned.
 */

import {
  DEFAULT_RETRIEVAL_K,
  MalformedStructuredOutputError,
  RuleCompilationError,
  compilePattern,
  getErrorMessage,
  type DiagnosisResponse,
  type DiagnosisRule,
  type FailureRecord,
  type FailureTemplate,
  type RetrievalMatch,
} from '@runwatch/core';
import type { LLMProvider } from '../llm/providers/types.js';
import { completeStructured, type StructuredRequest } from '../llm/structured.js';
import { createDiagnosisRule } from '../rules/rule-store.js';
import { createLogger } from '../logger.js';
import { buildDiagnosisPrompt, DIAGNOSIS_SCHEMA } from './prompt-templates.js';
import { reconcileDiagnoses } from './self-consistency.js';

const log = createLogger('FailureReasoningAgent');

/** Anything that can look up similar past failures (the RetrievalStore) */
export interface FailureRetriever {
  search(queryText: string, k: number): Promise<RetrievalMatch[]>;
}

export interface FailureReasoningAgentOptions {
  provider: LLMProvider;
  retriever: FailureRetriever;
  /** Past failures retrieved per request (default 3) */
  retrievalK?: number;
  /** Extra attempts after malformed output (default 2) */
  parseRetries?: number;
  /** Independent samples for self-consistency; 1 disables it */
  samples?: number;
  timeoutMs?: number;
}

export interface ReasonOptions {
  /** Escalated lines preceding the failure, oldest first */
  recentContext?: readonly string[];
}

export interface ReasoningResult {
  record: FailureRecord;
  candidateRule: DiagnosisRule | null;
  retrieved: RetrievalMatch[];
}

export class FailureReasoningAgent {
  private readonly provider: LLMProvider;
  private readonly retriever: FailureRetriever;
  private readonly retrievalK: number;
  private readonly parseRetries: number;
  private readonly samples: number;
  private readonly timeoutMs: number | undefined;

  constructor(options: FailureReasoningAgentOptions) {
    this.provider = options.provider;
    this.retriever = options.retriever;
    this.retrievalK = options.retrievalK ?? DEFAULT_RETRIEVAL_K;
    this.parseRetries = options.parseRetries ?? 2;
    this.samples = Math.max(1, options.samples ?? 1);
    this.timeoutMs = options.timeoutMs;
  }

  /**
   * Diagnose a failure line that no diagnosis rule matched.
   *
   * @throws TransientReasoningError when the model or retrieval backend is unreachable
   * @throws MalformedStructuredOutputError when no valid response survives the parse retries
   */
  async reason(line: string, opts: ReasonOptions = {}): Promise<ReasoningResult> {
    const retrieved = await this.retriever.search(line, this.retrievalK);
    const { system, user } = buildDiagnosisPrompt(line, retrieved, opts.recentContext);

    const response =
      this.samples > 1
        ? await this.sampleAndReconcile({ systemPrompt: system, userPrompt: user, temperature: 0.7 })
        : await this.requestDiagnosis({ systemPrompt: system, userPrompt: user, temperature: 0.2 });

    const record: FailureRecord = {
      ...toTemplate(response),
      provenance: 'llm_generated',
      originatingRuleId: null,
    };

    log.info('Diagnosed failure', {
      errorType: record.errorType,
      source: record.source,
      retrieved: retrieved.length,
    });

    return { record, candidateRule: this.buildCandidate(line, response), retrieved };
  }

  /** One diagnosis, re-asking with the same prompt on malformed output */
  private async requestDiagnosis(base: StructuredRequest): Promise<DiagnosisResponse> {
    const request: StructuredRequest = { ...base, maxTokens: 1024, timeoutMs: this.timeoutMs };
    for (let attempt = 0; ; attempt++) {
      try {
        return await completeStructured(this.provider, request, DIAGNOSIS_SCHEMA);
      } catch (err: unknown) {
        if (!(err instanceof MalformedStructuredOutputError) || attempt >= this.parseRetries) throw err;
        log.warn('Malformed diagnosis, retrying', { attempt: attempt + 1, error: err.message });
      }
    }
  }

  private async sampleAndReconcile(base: StructuredRequest): Promise<DiagnosisResponse> {
    const settled = await Promise.allSettled(
      Array.from({ length: this.samples }, () => this.requestDiagnosis(base)),
    );

    const responses: DiagnosisResponse[] = [];
    let lastMalformed: MalformedStructuredOutputError | undefined;
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        responses.push(result.value);
      } else if (result.reason instanceof MalformedStructuredOutputError) {
        lastMalformed = result.reason;
      } else {
        throw result.reason;
      }
    }

    if (responses.length === 0) {
      throw lastMalformed ?? new MalformedStructuredOutputError('No diagnosis samples survived validation');
    }
    log.debug('Reconciling diagnosis samples', { requested: this.samples, valid: responses.length });
    return reconcileDiagnoses(responses);
  }

  /** A rule is proposed only when its pattern compiles and matches the line it came from */
  private buildCandidate(line: string, response: DiagnosisResponse): DiagnosisRule | null {
    const pattern = response.new_rule_regex?.trim();
    if (!pattern) return null;

    let compiled: RegExp;
    try {
      compiled = compilePattern(pattern, 's');
    } catch (err: unknown) {
      log.warn('Discarding candidate diagnosis rule', { pattern, error: getErrorMessage(err) });
      return null;
    }
    if (!compiled.test(line)) {
      const err = new RuleCompilationError(pattern, 'does not match the failure line it was derived from');
      log.warn('Discarding candidate diagnosis rule', { pattern, error: err.message });
      return null;
    }

    return createDiagnosisRule(pattern, toTemplate(response));
  }
}

function toTemplate(response: DiagnosisResponse): FailureTemplate {
  return {
    rootCause: response.root_cause.trim(),
    errorType: response.error_type.trim(),
    source: response.source,
    isRecoverable: response.is_recoverable,
    mitigation: response.mitigation.trim(),
  };
}
