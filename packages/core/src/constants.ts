/**
 * @runwatch/core — Constants
 */

import type { FailureTemplate } from './types.js';

/**
 * Lines matching this are failure candidates and bypass filter rules.
 * Substring match, so `RuntimeError` and `CUDA_ERROR_OUT_OF_MEMORY` count.
 */
export const DEFAULT_FAILURE_INDICATOR = 'ERROR|FATAL|CRITICAL|Traceback|Exception';

export const UNKNOWN_ERROR_TYPE = 'unknown';

export const MANUAL_INVESTIGATION = 'manual investigation required';

/** Template used when no diagnosis could be produced */
export const FALLBACK_TEMPLATE: Readonly<FailureTemplate> = Object.freeze({
  rootCause: 'Automated diagnosis unavailable',
  errorType: UNKNOWN_ERROR_TYPE,
  source: 'unknown',
  isRecoverable: false,
  mitigation: MANUAL_INVESTIGATION,
});

/** Number of past failures retrieved to ground a reasoning request */
export const DEFAULT_RETRIEVAL_K = 3;

/** Lines per log chunk */
export const DEFAULT_CHUNK_SIZE = 20;

/** Jobs whose orchestrators the HTTP API keeps in memory at once */
export const DEFAULT_MAX_JOBS = 100;

/** Maximum buffered unfiltered lines before pattern synthesis is forced */
export const DEFAULT_FILTER_BUFFER_SIZE = 50;

export const FILTER_RULES_FILE = 'filter_rules.json';
export const DIAGNOSIS_RULES_FILE = 'diagnosis_rules.json';
