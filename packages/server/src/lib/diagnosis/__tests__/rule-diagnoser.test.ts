/**
 * Tests for RuleDiagnoser
 */

import { describe, it, expect } from 'vitest';
import type { DiagnosisRule, FailureTemplate } from '@runwatch/core';
import { RuleDiagnoser } from '../rule-diagnoser.js';

const NCCL: FailureTemplate = {
  rootCause: 'NCCL collective timed out',
  errorType: 'nccl_timeout',
  source: 'infrastructure_failure',
  isRecoverable: true,
  mitigation: 'Restart from the last checkpoint',
};

function rule(id: string, pattern: string, template: FailureTemplate = NCCL): DiagnosisRule {
  return { id, pattern, template, createdAt: '2024-01-01T00:00:00.000Z', matchCount: 0 };
}

describe('RuleDiagnoser', () => {
  it('returns the templated rule-based record for the first match', () => {
    const nccl = rule('r1', 'NCCL timeout on rank \\d+');
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [nccl] });

    expect(diagnoser.diagnose('ERROR: NCCL timeout on rank 7')).toEqual({
      ...NCCL,
      provenance: 'rule_based',
      originatingRuleId: 'r1',
    });
    expect(nccl.matchCount).toBe(1);
  });

  it('returns null on a miss', () => {
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [rule('r1', 'NCCL')] });
    expect(diagnoser.diagnose('ERROR: CUDA out of memory')).toBeNull();
  });

  it('prefers rules in insertion order', () => {
    const oom: FailureTemplate = { ...NCCL, errorType: 'oom' };
    const diagnoser = new RuleDiagnoser({
      diagnosisRules: [rule('first', 'ERROR', oom), rule('second', 'ERROR: NCCL')],
    });
    expect(diagnoser.diagnose('ERROR: NCCL timeout')?.originatingRuleId).toBe('first');
  });

  it('is deterministic with only the match count changing', () => {
    const nccl = rule('r1', 'NCCL timeout');
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [nccl] });

    const first = diagnoser.diagnose('ERROR: NCCL timeout on rank 3');
    const second = diagnoser.diagnose('ERROR: NCCL timeout on rank 3');

    expect(second).toEqual(first);
    expect(nccl.matchCount).toBe(2);
    expect(nccl.template).toEqual(NCCL);
  });

  it('lets . span newlines in multi-line failures', () => {
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [rule('tb', 'Traceback.*RuntimeError')] });
    expect(diagnoser.diagnose('Traceback (most recent call last):\n  ...\nRuntimeError: boom')).not.toBeNull();
  });

  it('accepts (?P<name>...) named groups', () => {
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [rule('r', 'rank (?P<rank>\\d+)')] });
    expect(diagnoser.diagnose('NCCL timeout on rank 12')?.originatingRuleId).toBe('r');
  });

  it('match() does not touch counters', () => {
    const nccl = rule('r1', 'NCCL');
    const diagnoser = new RuleDiagnoser({ diagnosisRules: [nccl] });
    expect(diagnoser.match('NCCL hang')?.id).toBe('r1');
    expect(nccl.matchCount).toBe(0);
  });
});
