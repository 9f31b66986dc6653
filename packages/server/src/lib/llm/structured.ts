/**
 * Structured completion — the single model boundary the agents call.
 *
 * complete(prompt, schema) → validated object. Malformed output is rejected here,
 * before it can reach the data model.
 */

import type { z } from 'zod';
import {
  MalformedStructuredOutputError,
  RunwatchError,
  TransientReasoningError,
  getErrorMessage,
} from '@runwatch/core';
import type { LLMCompletionRequest, LLMProvider } from './providers/types.js';

export interface StructuredSchema<T> {
  /** Schema/tool name reported to the provider */
  name: string;
  /** JSON schema sent with the request (OpenAI strict mode compatible) */
  jsonSchema: Record<string, unknown>;
  /** Runtime validator for the response */
  parser: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export type StructuredRequest = Omit<LLMCompletionRequest, 'jsonSchema' | 'schemaName'>;

/**
 * Strip a surrounding markdown code fence (```json ... ```), which some
 * models emit even when asked for bare JSON.
 */
export function stripCodeFences(raw: string): string {
  const text = raw.trim();
  if (!text.startsWith('```')) return text;
  const lines = text.split('\n').slice(1);
  if (lines.length > 0 && lines[lines.length - 1]!.trim() === '```') lines.pop();
  return lines.join('\n').trim();
}

/**
 * Parse and validate raw model output against a schema.
 *
 * @throws MalformedStructuredOutputError on invalid JSON or schema violations
 */
export function parseStructured<T>(raw: string, schema: StructuredSchema<T>): T {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch {
    throw new MalformedStructuredOutputError(`Invalid JSON from model for ${schema.name}`, raw);
  }

  const result = schema.parser.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new MalformedStructuredOutputError(
      `Schema validation failed for ${schema.name}: ${issues.join('; ')}`,
      raw,
    );
  }
  return result.data;
}

/**
 * Request a structured response and validate it.
 *
 * @throws TransientReasoningError when the call itself fails (network, timeout, error status)
 * @throws MalformedStructuredOutputError when the response fails validation
 */
export async function completeStructured<T>(
  provider: LLMProvider,
  request: StructuredRequest,
  schema: StructuredSchema<T>,
): Promise<T> {
  let content: string;
  try {
    const response = await provider.complete({
      ...request,
      jsonSchema: schema.jsonSchema,
      schemaName: schema.name,
    });
    content = response.content;
  } catch (err: unknown) {
    if (err instanceof RunwatchError) throw err;
    throw new TransientReasoningError(`${provider.name} request failed: ${getErrorMessage(err)}`, err);
  }

  return parseStructured(content, schema);
}
