/**
 * Self-consistency voting over independent model samples.
 */

import type { DiagnosisResponse } from '@runwatch/core';
import { tokenJaccard } from '../embeddings/index.js';

function voteKey(r: DiagnosisResponse): string {
  return `${r.error_type.trim().toLowerCase()}\u0000${r.is_recoverable}`;
}

/** Group item indices by key, groups ordered by first appearance */
function groupIndices<T>(items: readonly T[], key: (item: T) => string): number[][] {
  const groups = new Map<string, number[]>();
  items.forEach((item, i) => {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(i);
    else groups.set(k, [i]);
  });
  return [...groups.values()];
}

/**
 * Reconcile diagnosis samples by majority vote on (error_type, is_recoverable).
 *
 * - a unique largest group wins with its first response
 * - a full split (every sample disagrees) keeps the first response
 * - otherwise groups tied for largest pool their responses; the one whose
 *   root_cause has the highest mean token similarity to all other responses
 *   wins, earliest on a tie
 */
export function reconcileDiagnoses(responses: readonly DiagnosisResponse[]): DiagnosisResponse {
  const first = responses[0];
  if (!first) throw new Error('reconcileDiagnoses requires at least one response');

  const groups = groupIndices(responses, voteKey);
  const largest = Math.max(...groups.map((g) => g.length));
  if (largest === 1) return first;

  const tied = groups.filter((g) => g.length === largest);

  if (tied.length === 1) return responses[tied[0]![0]!]!;

  const candidates = tied.flat().sort((a, b) => a - b);
  let best = candidates[0]!;
  let bestScore = -1;
  for (const i of candidates) {
    let total = 0;
    for (let j = 0; j < responses.length; j++) {
      if (j !== i) total += tokenJaccard(responses[i]!.root_cause, responses[j]!.root_cause);
    }
    const mean = total / (responses.length - 1);
    if (mean > bestScore) {
      best = i;
      bestScore = mean;
    }
  }
  return responses[best]!;
}

/**
 * Most frequent item by key; ties go to the key seen first.
 * Returns the first item carrying the winning key.
 */
export function mostFrequent<T>(items: readonly T[], key: (item: T) => string): T | undefined {
  let winner: number[] | undefined;
  for (const group of groupIndices(items, key)) {
    if (!winner || group.length > winner.length) winner = group;
  }
  return winner ? items[winner[0]!] : undefined;
}
