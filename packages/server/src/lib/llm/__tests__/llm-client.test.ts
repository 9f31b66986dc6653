/**
 * Tests for LLM provider selection
 */

import { describe, it, expect, afterEach } from 'vitest';
import { ConfigurationError } from '@runwatch/core';
import { createLLMProvider, getLLMConfigFromEnv, type LLMConfig } from '../llm-client.js';

describe('getLLMConfigFromEnv', () => {
  const originalEnv = { ...process.env };

  afterEach(() => {
    process.env = { ...originalEnv };
  });

  it('returns null without an API key', () => {
    delete process.env['RUNWATCH_LLM_API_KEY'];
    expect(getLLMConfigFromEnv()).toBeNull();
  });

  it('defaults to the openai provider', () => {
    process.env['RUNWATCH_LLM_API_KEY'] = 'test-key';
    delete process.env['RUNWATCH_LLM_PROVIDER'];
    delete process.env['RUNWATCH_LLM_MODEL'];
    delete process.env['RUNWATCH_LLM_BASE_URL'];
    expect(getLLMConfigFromEnv()).toEqual({
      provider: 'openai',
      apiKey: 'test-key',
      model: undefined,
      baseUrl: undefined,
    });
  });

  it('reads provider, model and base URL', () => {
    process.env['RUNWATCH_LLM_API_KEY'] = 'test-key';
    process.env['RUNWATCH_LLM_PROVIDER'] = 'anthropic';
    process.env['RUNWATCH_LLM_MODEL'] = 'claude-test';
    process.env['RUNWATCH_LLM_BASE_URL'] = 'http://localhost:9999';
    expect(getLLMConfigFromEnv()).toEqual({
      provider: 'anthropic',
      apiKey: 'test-key',
      model: 'claude-test',
      baseUrl: 'http://localhost:9999',
    });
  });

  it('rejects an unknown provider', () => {
    process.env['RUNWATCH_LLM_API_KEY'] = 'test-key';
    process.env['RUNWATCH_LLM_PROVIDER'] = 'cohere';
    expect(() => getLLMConfigFromEnv()).toThrow(ConfigurationError);
  });
});

describe('createLLMProvider', () => {
  it('creates an OpenAI provider with the default model', () => {
    const provider = createLLMProvider({ provider: 'openai', apiKey: 'test-key' });
    expect(provider.name).toBe('openai');
    expect(provider.model).toBe('gpt-4o');
  });

  it('creates an Anthropic provider with a model override', () => {
    const provider = createLLMProvider({ provider: 'anthropic', apiKey: 'test-key', model: 'claude-test' });
    expect(provider.name).toBe('anthropic');
    expect(provider.model).toBe('claude-test');
  });

  it('throws ConfigurationError for an unknown provider', () => {
    const config = { provider: 'cohere', apiKey: 'test-key' } as unknown as LLMConfig;
    expect(() => createLLMProvider(config)).toThrow('Unknown LLM provider: cohere');
  });
});
