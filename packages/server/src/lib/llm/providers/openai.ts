/**
 * OpenAI Chat Completions Adapter
 *
 * Uses raw fetch — no SDK dependency. Consistent with embeddings/openai.ts pattern.
 */

import type { LLMProvider, LLMCompletionRequest, LLMCompletionResponse } from './types.js';

const DEFAULT_MODEL = 'gpt-4o';
const DEFAULT_BASE_URL = 'https://api.openai.com';

interface OpenAIChatResponse {
  choices: Array<{
    message: { content: string | null };
    finish_reason: string;
  }>;
  usage: {
    prompt_tokens: number;
    completion_tokens: number;
  };
  model: string;
}

export function createOpenAIProvider(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMProvider {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const resolvedBaseUrl = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');

  return {
    name: 'openai',
    model: resolvedModel,

    async complete(req: LLMCompletionRequest): Promise<LLMCompletionResponse> {
      const start = performance.now();

      const body: Record<string, unknown> = {
        model: resolvedModel,
        messages: [
          { role: 'system', content: req.systemPrompt },
          { role: 'user', content: req.userPrompt },
        ],
        temperature: req.temperature ?? 0,
        max_tokens: req.maxTokens ?? 2048,
      };

      if (req.jsonSchema) {
        body['response_format'] = {
          type: 'json_schema',
          json_schema: {
            name: req.schemaName ?? 'structured_response',
            strict: true,
            schema: req.jsonSchema,
          },
        };
      }

      const response = await fetch(`${resolvedBaseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: req.timeoutMs ? AbortSignal.timeout(req.timeoutMs) : undefined,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`OpenAI API error (${response.status}): ${errorBody}`);
      }

      const json = (await response.json()) as OpenAIChatResponse;
      const latencyMs = Math.round(performance.now() - start);

      return {
        content: json.choices[0]?.message.content ?? '',
        inputTokens: json.usage.prompt_tokens,
        outputTokens: json.usage.completion_tokens,
        model: json.model,
        latencyMs,
      };
    },
  };
}
