/**
 * Log Pattern Agent — learns filter rules from unfiltered routine lines.
 *
 * Never fatal: model failures and unusable regexes are logged and yield null.
 */

import {
  RuleCompilationError,
  compilePattern,
  getErrorMessage,
  normalizePattern,
  type FilterRule,
  type LogLine,
  type LogPatternResponse,
} from '@runwatch/core';
import type { LLMProvider } from '../llm/providers/types.js';
import { completeStructured } from '../llm/structured.js';
import { createFilterRule } from '../rules/rule-store.js';
import { createLogger } from '../logger.js';
import { buildLogPatternPrompt, LOG_PATTERN_SCHEMA } from './prompt-templates.js';
import { mostFrequent } from './self-consistency.js';

const log = createLogger('LogPatternAgent');

export interface LogPatternAgentOptions {
  provider: LLMProvider;
  /** Independent samples voted on (default 3) */
  samples?: number;
  timeoutMs?: number;
}

interface Proposal {
  regex: string;
  description: string;
}

export class LogPatternAgent {
  private readonly provider: LLMProvider;
  private readonly samples: number;
  private readonly timeoutMs: number | undefined;

  constructor(options: LogPatternAgentOptions) {
    this.provider = options.provider;
    this.samples = Math.max(1, options.samples ?? 3);
    this.timeoutMs = options.timeoutMs;
  }

  async synthesize(lines: readonly LogLine[]): Promise<FilterRule | null> {
    if (lines.length === 0) return null;

    const { system, user } = buildLogPatternPrompt(lines);
    const settled = await Promise.allSettled(
      Array.from({ length: this.samples }, () =>
        completeStructured(
          this.provider,
          {
            systemPrompt: system,
            userPrompt: user,
            temperature: this.samples > 1 ? 0.7 : 0,
            maxTokens: 512,
            timeoutMs: this.timeoutMs,
          },
          LOG_PATTERN_SCHEMA,
        ),
      ),
    );

    const proposals: Proposal[] = [];
    for (const result of settled) {
      if (result.status === 'rejected') {
        log.warn('Pattern request failed', { error: getErrorMessage(result.reason) });
        continue;
      }
      const proposal = toProposal(result.value);
      if (proposal) proposals.push(proposal);
    }

    const winner = mostFrequent(proposals, (p) => p.regex);
    if (!winner) {
      log.info('No stable pattern proposed', { lines: lines.length });
      return null;
    }

    let compiled: RegExp;
    try {
      compiled = compilePattern(winner.regex);
    } catch (err: unknown) {
      log.warn('Discarding proposed filter rule', { pattern: winner.regex, error: getErrorMessage(err) });
      return null;
    }
    if (!lines.some((l) => compiled.test(l.text))) {
      const err = new RuleCompilationError(winner.regex, 'matches none of the buffered lines');
      log.warn('Discarding proposed filter rule', { pattern: winner.regex, error: err.message });
      return null;
    }

    log.info('Synthesized filter rule', {
      pattern: winner.regex,
      votes: proposals.filter((p) => p.regex === winner.regex).length,
      samples: this.samples,
    });
    return createFilterRule(winner.regex, winner.description);
  }
}

function toProposal(response: LogPatternResponse): Proposal | null {
  if (!response.is_pattern || response.regex === null) return null;
  const regex = normalizePattern(response.regex);
  return regex ? { regex, description: response.description.trim() } : null;
}
