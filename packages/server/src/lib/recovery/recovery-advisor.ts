/**
 * Recovery Advisor — maps a diagnosis to a recommended action.
 *
 * Classification only; nothing is executed against the cluster.
 */

import { MANUAL_INVESTIGATION, type FailureRecord, type RecoveryAction } from '@runwatch/core';

export function advise(record: Pick<FailureRecord, 'isRecoverable' | 'mitigation'>): RecoveryAction {
  const mitigation = record.mitigation.trim();
  if (record.isRecoverable) {
    return { kind: 'auto_recoverable', description: mitigation };
  }
  return { kind: 'manual_intervention', description: mitigation || MANUAL_INVESTIGATION };
}
