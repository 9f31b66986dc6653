/**
 * Console capture and in-process stand-ins for command tests.
 */
import { vi } from 'vitest';
import { DEFAULT_FAILURE_INDICATOR } from '@runwatch/core';
import type { LLMProvider, RunwatchConfig } from '@runwatch/server';

export interface Captured {
  out: string[];
  err: string[];
}

/** Route console output into arrays and silence the JSON logger */
export function captureConsole(): Captured {
  const captured: Captured = { out: [], err: [] };
  vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
    captured.out.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    captured.err.push(args.join(' '));
  });
  vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
  vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
  return captured;
}

export const NCCL_DIAGNOSIS = {
  root_cause: 'NCCL collective timed out waiting for a peer rank',
  error_type: 'nccl_timeout',
  source: 'infrastructure_failure',
  is_recoverable: true,
  mitigation: 'Restart the job from the last checkpoint',
  new_rule_regex: 'NCCL timeout on rank \\d+',
};

/** Provider that always answers with the same JSON body */
export function fixedProvider(reply: object): LLMProvider {
  return {
    name: 'fixed',
    model: 'fixed-model',
    complete: vi.fn(async () => ({
      content: JSON.stringify(reply),
      inputTokens: 10,
      outputTokens: 10,
      model: 'fixed-model',
      latencyMs: 1,
    })),
  };
}

export function cliConfig(rulesDir: string, overrides: Partial<RunwatchConfig> = {}): RunwatchConfig {
  return {
    llm: { provider: 'openai', apiKey: 'test-key' },
    llmTimeoutMs: 1_000,
    embeddingBackend: 'hashing',
    rulesDir,
    dbPath: ':memory:',
    chunkSize: 20,
    filterBufferSize: 50,
    patternIntervalChunks: 1,
    failureIndicator: DEFAULT_FAILURE_INDICATOR,
    maxJobs: 100,
    retrievalK: 3,
    parseRetries: 0,
    reasoningRetries: 0,
    retryBaseDelayMs: 0,
    selfConsistency: 1,
    patternSelfConsistency: 1,
    port: 3500,
    corsOrigin: '*',
    ...overrides,
  };
}
