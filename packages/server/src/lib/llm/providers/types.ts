/**
 * LLM Provider Interface
 */

export interface LLMCompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** JSON schema the response must follow (structured output) */
  jsonSchema?: Record<string, unknown>;
  /** Name reported to the API for the structured schema */
  schemaName?: string;
  temperature?: number;
  maxTokens?: number;
  /** Abort the request after this many milliseconds */
  timeoutMs?: number;
}

export interface LLMCompletionResponse {
  content: string;
  inputTokens: number;
  outputTokens: number;
  model: string;
  latencyMs: number;
}

export interface LLMProvider {
  readonly name: string;
  readonly model: string;
  complete(req: LLMCompletionRequest): Promise<LLMCompletionResponse>;
}
