/**
 * Log Filter — suppresses routine lines with learned filter rules.
 *
 * Failure lines always escalate; filter rules only ever see non-failure
 * lines. Escalated non-failure lines are kept in a bounded buffer for the
 * log pattern agent.
 */

import {
  DEFAULT_FAILURE_INDICATOR,
  DEFAULT_FILTER_BUFFER_SIZE,
  compilePattern,
  tryCompilePattern,
  type FilterDecision,
  type FilterRule,
  type LogLine,
} from '@runwatch/core';
import { createLogger } from '../logger.js';

const log = createLogger('LogFilter');

/** Anything exposing filter rules in insertion order (the RuleStore) */
export interface FilterRuleSource {
  readonly filterRules: readonly FilterRule[];
}

export interface LogFilterOptions {
  /** Maximum lines kept in the unfiltered buffer */
  bufferSize?: number;
  /** Regex source marking failure lines, matched case-insensitively */
  failureIndicator?: string;
}

export class LogFilter {
  private readonly buffer: LogLine[] = [];
  private readonly compiled = new Map<string, RegExp | null>();
  private readonly failureIndicator: RegExp;
  readonly bufferSize: number;

  constructor(
    private readonly rules: FilterRuleSource,
    options: LogFilterOptions = {},
  ) {
    this.bufferSize = options.bufferSize ?? DEFAULT_FILTER_BUFFER_SIZE;
    this.failureIndicator = compilePattern(options.failureIndicator ?? DEFAULT_FAILURE_INDICATOR, 'i');
  }

  classify(line: LogLine): FilterDecision {
    if (line.text.trim() === '') {
      return { kind: 'suppressed', line, ruleId: null };
    }

    if (this.failureIndicator.test(line.text)) {
      return { kind: 'escalated', line, failureCandidate: true };
    }

    for (const rule of this.rules.filterRules) {
      const regex = this.regexFor(rule.pattern);
      if (regex?.test(line.text)) {
        rule.hitCount++;
        return { kind: 'suppressed', line, ruleId: rule.id };
      }
    }

    this.pushBuffer(line);
    return { kind: 'escalated', line, failureCandidate: false };
  }

  /** True when the line carries a failure signature */
  isFailureLine(text: string): boolean {
    return this.failureIndicator.test(text);
  }

  get bufferedLines(): readonly LogLine[] {
    return this.buffer;
  }

  get isBufferFull(): boolean {
    return this.buffer.length >= this.bufferSize;
  }

  /** Return the buffered lines and clear the buffer */
  drainBuffer(): LogLine[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  private pushBuffer(line: LogLine): void {
    this.buffer.push(line);
    if (this.buffer.length > this.bufferSize) this.buffer.shift();
  }

  private regexFor(pattern: string): RegExp | null {
    let regex = this.compiled.get(pattern);
    if (regex === undefined) {
      regex = tryCompilePattern(pattern);
      if (regex === null) log.warn('Skipping filter rule with invalid pattern', { pattern });
      this.compiled.set(pattern, regex);
    }
    return regex;
  }
}
