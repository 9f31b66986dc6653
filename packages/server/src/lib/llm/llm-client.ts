/**
 * LLM Client Factory
 *
 * Creates the appropriate LLM provider based on configuration.
 */

import { ConfigurationError } from '@runwatch/core';
import type { LLMProvider } from './providers/types.js';
import { createOpenAIProvider } from './providers/openai.js';
import { createAnthropicProvider } from './providers/anthropic.js';

export type LLMProviderName = 'openai' | 'anthropic';

export interface LLMConfig {
  provider: LLMProviderName;
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/**
 * Create an LLM provider from configuration.
 */
export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case 'openai':
      return createOpenAIProvider(config.apiKey, config.model, config.baseUrl);
    case 'anthropic':
      return createAnthropicProvider(config.apiKey, config.model, config.baseUrl);
    default:
      throw new ConfigurationError(`Unknown LLM provider: ${String(config.provider)}`);
  }
}

function parseProvider(raw: string | undefined): LLMProviderName {
  if (raw === undefined || raw === '' || raw === 'openai') return 'openai';
  if (raw === 'anthropic') return 'anthropic';
  throw new ConfigurationError(`Invalid RUNWATCH_LLM_PROVIDER: '${raw}'. Expected 'openai' or 'anthropic'.`);
}

/**
 * Read LLM configuration from environment variables.
 * Returns null if RUNWATCH_LLM_API_KEY is not set (reasoning degrades to the fallback diagnosis).
 */
export function getLLMConfigFromEnv(): LLMConfig | null {
  const apiKey = process.env['RUNWATCH_LLM_API_KEY'];
  if (!apiKey) return null;

  return {
    provider: parseProvider(process.env['RUNWATCH_LLM_PROVIDER']),
    apiKey,
    model: process.env['RUNWATCH_LLM_MODEL'] || undefined,
    baseUrl: process.env['RUNWATCH_LLM_BASE_URL'] || undefined,
  };
}
