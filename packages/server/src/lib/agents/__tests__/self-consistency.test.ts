/**
 * Tests for self-consistency voting
 */

import { describe, it, expect } from 'vitest';
import { mostFrequent, reconcileDiagnoses } from '../self-consistency.js';
import { diagnosisReply } from '../../../__tests__/fakes.js';

describe('reconcileDiagnoses', () => {
  it('returns the first response of a unique majority', () => {
    const a1 = diagnosisReply({ root_cause: 'first nccl' });
    const b = diagnosisReply({ error_type: 'cuda_oom', is_recoverable: false });
    const a2 = diagnosisReply({ root_cause: 'second nccl' });
    expect(reconcileDiagnoses([b, a1, a2])).toBe(a1);
  });

  it('votes on error_type case-insensitively', () => {
    const a = diagnosisReply({ error_type: 'NCCL_Timeout' });
    const b = diagnosisReply({ error_type: 'cuda_oom' });
    const c = diagnosisReply({ error_type: 'nccl_timeout ' });
    expect(reconcileDiagnoses([b, a, c])).toBe(a);
  });

  it('treats is_recoverable as part of the vote', () => {
    const a = diagnosisReply({ is_recoverable: true });
    const b = diagnosisReply({ is_recoverable: false });
    const c = diagnosisReply({ is_recoverable: false });
    expect(reconcileDiagnoses([a, b, c])).toBe(b);
  });

  it('keeps the first response on a full split even when others share wording', () => {
    const responses = [
      diagnosisReply({ error_type: 'a', root_cause: 'disk full on node' }),
      diagnosisReply({ error_type: 'b', root_cause: 'nccl peer timeout rank' }),
      diagnosisReply({ error_type: 'c', root_cause: 'nccl peer timeout link' }),
    ];
    expect(reconcileDiagnoses(responses)).toBe(responses[0]);
  });

  it('returns the first response on a full split with equal root causes', () => {
    const responses = [
      diagnosisReply({ error_type: 'a' }),
      diagnosisReply({ error_type: 'b' }),
      diagnosisReply({ error_type: 'c' }),
    ];
    expect(reconcileDiagnoses(responses)).toBe(responses[0]);
  });

  it('breaks a tie between majorities by root-cause centrality', () => {
    const responses = [
      diagnosisReply({ error_type: 'nccl_timeout', root_cause: 'timeout' }),
      diagnosisReply({ error_type: 'cuda_oom', is_recoverable: false, root_cause: 'gpu memory exhausted' }),
      diagnosisReply({ error_type: 'nccl_timeout', root_cause: 'nccl allreduce timeout on rank' }),
      diagnosisReply({ error_type: 'cuda_oom', is_recoverable: false, root_cause: 'gpu memory exhausted by batch' }),
    ];
    // mean similarity: [0.067, 0.2, 0.067, 0.2]; the earlier of the tied pair wins
    expect(reconcileDiagnoses(responses)).toBe(responses[1]);
  });

  it('returns a single response unchanged', () => {
    const only = diagnosisReply();
    expect(reconcileDiagnoses([only])).toBe(only);
  });

  it('rejects an empty list', () => {
    expect(() => reconcileDiagnoses([])).toThrow('at least one response');
  });
});

describe('mostFrequent', () => {
  const id = (s: string) => s;

  it('picks the most frequent key', () => {
    expect(mostFrequent(['a', 'b', 'b'], id)).toBe('b');
  });

  it('breaks ties by first appearance', () => {
    expect(mostFrequent(['a', 'b', 'b', 'a'], id)).toBe('a');
  });

  it('returns undefined for no items', () => {
    expect(mostFrequent([], id)).toBeUndefined();
  });
});
