/**
 * Rule-Based Diagnoser — tier 1.
 *
 * Matches escalated text against diagnosis rules in insertion order. Pure
 * lookup: no model and no retrieval calls.
 */

import { tryCompilePattern, type DiagnosisRule, type FailureRecord } from '@runwatch/core';

/** Anything exposing diagnosis rules in insertion order (the RuleStore) */
export interface DiagnosisRuleSource {
  readonly diagnosisRules: readonly DiagnosisRule[];
}

export class RuleDiagnoser {
  private readonly compiled = new Map<string, RegExp | null>();

  constructor(private readonly rules: DiagnosisRuleSource) {}

  /**
   * Classify a failure line. Returns null on a miss.
   * Increments the matching rule's matchCount.
   */
  diagnose(text: string): FailureRecord | null {
    const rule = this.match(text);
    if (!rule) return null;
    rule.matchCount++;
    return {
      ...rule.template,
      provenance: 'rule_based',
      originatingRuleId: rule.id,
    };
  }

  /** First matching rule, without touching its counters */
  match(text: string): DiagnosisRule | null {
    for (const rule of this.rules.diagnosisRules) {
      if (this.regexFor(rule.pattern)?.test(text)) return rule;
    }
    return null;
  }

  private regexFor(pattern: string): RegExp | null {
    let regex = this.compiled.get(pattern);
    if (regex === undefined) {
      regex = tryCompilePattern(pattern, 's');
      this.compiled.set(pattern, regex);
    }
    return regex;
  }
}
