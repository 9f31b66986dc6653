/**
 * Anthropic Messages Adapter
 *
 * Uses forced tool-use for structured JSON output. Raw fetch, no SDK.
 */

import type { LLMProvider, LLMCompletionRequest, LLMCompletionResponse } from './types.js';

const DEFAULT_MODEL = 'claude-3-5-sonnet-20241022';
const DEFAULT_BASE_URL = 'https://api.anthropic.com';

interface AnthropicMessage {
  content: Array<
    | { type: 'text'; text: string }
    | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  >;
  usage: { input_tokens: number; output_tokens: number };
  model: string;
}

export function createAnthropicProvider(
  apiKey: string,
  model?: string,
  baseUrl?: string,
): LLMProvider {
  const resolvedModel = model ?? DEFAULT_MODEL;
  const resolvedBaseUrl = (baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');

  return {
    name: 'anthropic',
    model: resolvedModel,

    async complete(req: LLMCompletionRequest): Promise<LLMCompletionResponse> {
      const start = performance.now();
      const toolName = req.schemaName ?? 'structured_response';

      const body: Record<string, unknown> = {
        model: resolvedModel,
        system: req.systemPrompt,
        messages: [{ role: 'user', content: req.userPrompt }],
        temperature: req.temperature ?? 0,
        max_tokens: req.maxTokens ?? 2048,
      };

      if (req.jsonSchema) {
        body['tools'] = [
          {
            name: toolName,
            description: 'Submit the answer as structured JSON',
            input_schema: req.jsonSchema,
          },
        ];
        body['tool_choice'] = { type: 'tool', name: toolName };
      }

      const response = await fetch(`${resolvedBaseUrl}/v1/messages`, {
        method: 'POST',
        headers: {
          'x-api-key': apiKey,
          'anthropic-version': '2023-06-01',
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: req.timeoutMs ? AbortSignal.timeout(req.timeoutMs) : undefined,
      });

      if (!response.ok) {
        const errorBody = await response.text();
        throw new Error(`Anthropic API error (${response.status}): ${errorBody}`);
      }

      const json = (await response.json()) as AnthropicMessage;
      const latencyMs = Math.round(performance.now() - start);

      // Prefer the tool_use result, fall back to text
      let content = '';
      for (const block of json.content) {
        if (block.type === 'tool_use') {
          content = JSON.stringify(block.input);
          break;
        }
        content = block.text;
      }

      return {
        content,
        inputTokens: json.usage.input_tokens,
        outputTokens: json.usage.output_tokens,
        model: json.model,
        latencyMs,
      };
    },
  };
}
