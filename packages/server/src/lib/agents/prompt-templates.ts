/**
 * Prompt templates and structured-output schemas for the reasoning and
 * log pattern agents.
 */

import {
  diagnosisResponseSchema,
  logPatternResponseSchema,
  type DiagnosisResponse,
  type LogLine,
  type LogPatternResponse,
  type RetrievalMatch,
} from '@runwatch/core';
import type { StructuredSchema } from '../llm/structured.js';

const DIAGNOSIS_SYSTEM_PROMPT = `You are a failure diagnosis expert for large-scale model training jobs (distributed PyTorch/JAX training on GPU clusters). You read a failing log line and classify its root cause.

You MUST respond with valid JSON matching the provided schema. Ground the diagnosis in the log line and in the similar past failures when they are relevant; ignore past failures that are not.

Fields:
- root_cause: one or two sentences naming the concrete cause.
- error_type: a short snake_case label for the failure class (e.g. nccl_timeout, cuda_oom, data_loader_crash). Reuse a past failure's label when it is the same class.
- source: application_failure (training code, config, data, user mistakes), infrastructure_failure (hardware, network, scheduler, storage), or unknown.
- is_recoverable: true when restarting or resuming the job without code changes is expected to succeed.
- mitigation: the concrete action an operator should take.
- new_rule_regex: a JavaScript regular expression that matches this failure line and future occurrences of the same failure (generalize ranks, node names, numbers and paths; do not anchor on timestamps), or null when the line is too unspecific to make a safe rule.`;

const LOG_PATTERN_SYSTEM_PROMPT = `You maintain log noise filters for large-scale model training jobs. You are given routine log lines that no existing filter suppressed.

You MUST respond with valid JSON matching the provided schema. Propose ONE JavaScript regular expression capturing the common shape of the routine lines (generalize numbers, step counters, paths and timestamps) so that future lines of the same kind can be suppressed. Never match warnings or errors.

If the lines share no stable shape, respond with is_pattern false and regex null.`;

/** Structured output for the failure reasoning agent */
export const DIAGNOSIS_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    root_cause: { type: 'string' },
    error_type: { type: 'string' },
    source: { type: 'string', enum: ['application_failure', 'infrastructure_failure', 'unknown'] },
    is_recoverable: { type: 'boolean' },
    mitigation: { type: 'string' },
    new_rule_regex: { type: ['string', 'null'] },
  },
  required: ['root_cause', 'error_type', 'source', 'is_recoverable', 'mitigation', 'new_rule_regex'],
  additionalProperties: false,
};

/** Structured output for the log pattern agent */
export const LOG_PATTERN_JSON_SCHEMA: Record<string, unknown> = {
  type: 'object',
  properties: {
    is_pattern: { type: 'boolean' },
    regex: { type: ['string', 'null'] },
    description: { type: 'string' },
  },
  required: ['is_pattern', 'regex', 'description'],
  additionalProperties: false,
};

export const DIAGNOSIS_SCHEMA: StructuredSchema<DiagnosisResponse> = {
  name: 'failure_diagnosis',
  jsonSchema: DIAGNOSIS_JSON_SCHEMA,
  parser: diagnosisResponseSchema,
};

export const LOG_PATTERN_SCHEMA: StructuredSchema<LogPatternResponse> = {
  name: 'log_pattern',
  jsonSchema: LOG_PATTERN_JSON_SCHEMA,
  parser: logPatternResponseSchema,
};

function formatMatch(match: RetrievalMatch, idx: number): string {
  const r = match.record;
  return [
    `  ${idx + 1}. [similarity ${match.score.toFixed(2)}] ${match.text}`,
    `     root_cause: ${r.rootCause}`,
    `     error_type: ${r.errorType} | source: ${r.source} | recoverable: ${r.isRecoverable ? 'yes' : 'no'}`,
    `     mitigation: ${r.mitigation}`,
  ].join('\n');
}

export function buildDiagnosisPrompt(
  line: string,
  matches: readonly RetrievalMatch[],
  recentContext: readonly string[] = [],
): { system: string; user: string } {
  const context = recentContext.length > 0 ? recentContext.map((l) => `  ${l}`).join('\n') : '  None';

  const past = matches.length > 0 ? matches.map(formatMatch).join('\n') : '  None on record';

  const user = `### Failure line:
${line}

### Preceding escalated lines:
${context}

### Similar past failures (${matches.length}):
${past}

Diagnose the failure line.`;

  return { system: DIAGNOSIS_SYSTEM_PROMPT, user };
}

export function buildLogPatternPrompt(lines: readonly LogLine[]): { system: string; user: string } {
  const body = lines.map((l) => `  ${l.text}`).join('\n');

  const user = `### Unfiltered routine lines (${lines.length}):
${body}

Propose a filter regex for these lines.`;

  return { system: LOG_PATTERN_SYSTEM_PROMPT, user };
}
