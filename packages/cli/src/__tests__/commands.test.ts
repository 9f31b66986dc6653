/**
 * Tests for the runwatch commands, run against temp directories and a fixed model.
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { RuleStore, type RunwatchConfig } from '@runwatch/server';
import { runRunCommand } from '../commands/run.js';
import { runValidateCommand } from '../commands/validate.js';
import { runResetCommand } from '../commands/reset.js';
import { runRulesCommand } from '../commands/rules.js';
import { NCCL_DIAGNOSIS, captureConsole, cliConfig, fixedProvider, type Captured } from './helpers.js';

const LOG = [
  'INFO: step 1 loss=2.31',
  'ERROR: NCCL timeout on rank 3',
  'INFO: step 2 loss=2.10',
  'ERROR: NCCL timeout on rank 7',
].join('\n');

let dir: string;
let rulesDir: string;
let logFile: string;
let config: RunwatchConfig;
let console_: Captured;

beforeEach(() => {
  console_ = captureConsole();
  dir = mkdtempSync(join(tmpdir(), 'runwatch-cli-'));
  rulesDir = join(dir, 'rules');
  logFile = join(dir, 'train.log');
  writeFileSync(logFile, LOG + '\n');
  config = cliConfig(rulesDir);
});

afterEach(() => {
  rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

function overrides() {
  return { provider: fixedProvider(NCCL_DIAGNOSIS), patternProvider: null };
}

describe('runwatch run', () => {
  it('prints each diagnosis and a summary', async () => {
    const code = await runRunCommand([logFile, '--job', 'job-1'], { config, overrides: overrides() });

    expect(code).toBe(0);
    expect(console_.out).toEqual([
      expect.stringMatching(/^ {2}learned diagnosis rule [0-9A-Z]{26}: \/NCCL timeout on rank \\d\+\/$/),
      'line 2 [reasoning] nccl_timeout (infrastructure_failure): NCCL collective timed out waiting for a peer rank',
      '  auto-recover: Restart the job from the last checkpoint',
      'line 4 [rule] nccl_timeout (infrastructure_failure): NCCL collective timed out waiting for a peer rank',
      '  auto-recover: Restart the job from the last checkpoint',
      'Processed 4 lines in 1 chunks (job job-1)',
      '  suppressed: 0  unfiltered: 2  failures: 2 (rule 1, reasoning 1, fallback 0)',
      '  learned: 0 filter rules, 1 diagnosis rules',
    ]);
    expect(new RuleStore(rulesDir).load().diagnosisRules).toHaveLength(1);
  });

  it('honours --chunk-size', async () => {
    await runRunCommand([logFile, '--chunk-size', '3', '--job', 'job-2'], { config, overrides: overrides() });

    expect(console_.out).toContain('Processed 4 lines in 2 chunks (job job-2)');
  });

  it('prints the summary as JSON with --json', async () => {
    const code = await runRunCommand([logFile, '--json'], { config, overrides: overrides() });

    expect(code).toBe(0);
    expect(console_.out).toHaveLength(1);
    const summary = JSON.parse(console_.out[0] ?? '');
    expect(summary.lines).toBe(4);
    expect(summary.failures).toBe(2);
    expect(summary.byTier).toEqual({ rule: 1, reasoning: 1, fallback: 0 });
  });

  it('fails on a missing log file', async () => {
    const code = await runRunCommand([join(dir, 'nope.log')], { config, overrides: overrides() });

    expect(code).toBe(1);
    expect(console_.err).toEqual([`Log file not found: ${join(dir, 'nope.log')}`]);
  });

  it('fails without a log file argument', async () => {
    expect(await runRunCommand([], { config })).toBe(1);
    expect(console_.err).toEqual(['Missing <log-file>']);
  });

  it('rejects a bad --chunk-size', async () => {
    expect(await runRunCommand([logFile, '--chunk-size', '0'], { config })).toBe(1);
    expect(console_.err).toEqual(['--chunk-size must be a positive integer, got: 0']);
  });

  it('requires LLM credentials', async () => {
    await expect(runRunCommand([logFile], { config: cliConfig(rulesDir, { llm: null }) })).rejects.toThrow(
      'RUNWATCH_LLM_API_KEY is required',
    );
  });
});

describe('runwatch validate', () => {
  it('passes every check for a complete configuration', () => {
    const code = runValidateCommand([], { config });

    expect(code).toBe(0);
    expect(console_.out).toEqual([
      '✅ LLM credentials: openai',
      '✅ Settings: all values in range',
      `✅ Rules directory: ${rulesDir} is writable`,
      '✅ Rule files: 0 filter rules, 0 diagnosis rules',
    ]);
    expect(existsSync(rulesDir)).toBe(true);
  });

  it('reports each failing check and exits 1', () => {
    const code = runValidateCommand([], { config: cliConfig(rulesDir, { llm: null, chunkSize: 0 }) });

    expect(code).toBe(1);
    expect(console_.out[0]).toBe('❌ LLM credentials: RUNWATCH_LLM_API_KEY is not set');
    expect(console_.out[1]).toBe('❌ Settings: chunk size must be a positive integer');
  });
});

describe('runwatch rules', () => {
  beforeEach(async () => {
    await runRunCommand([logFile, '--json'], { config, overrides: overrides() });
    console_.out.length = 0;
  });

  it('lists diagnosis rules as JSON', () => {
    const code = runRulesCommand(['diagnosis', '--json'], { config });

    expect(code).toBe(0);
    const listed = JSON.parse(console_.out[0] ?? '');
    expect(Object.keys(listed)).toEqual(['diagnosis']);
    expect(listed.diagnosis[0].pattern).toBe('NCCL timeout on rank \\d+');
    expect(listed.diagnosis[0].matchCount).toBe(1);
  });

  it('prints both collections as tables', () => {
    runRulesCommand([], { config });

    expect(console_.out[0]).toBe('Filter rules (0)');
    expect(console_.out[1]).toMatch(/^ ID +│ Pattern +│ Hits +│ Created +│ Description $/);
    expect(console_.out).toContain('Diagnosis rules (1)');
    const row = console_.out[console_.out.length - 1] ?? '';
    expect(row.split('│').map((cell) => cell.trim()).slice(1)).toEqual([
      'NCCL timeout on rank \\d+',
      'nccl_timeout',
      'infrastructure_failure',
      'yes',
      '1',
    ]);
  });

  it('rejects an unknown kind', () => {
    expect(runRulesCommand(['everything'], { config })).toBe(1);
    expect(console_.err).toEqual(['Unknown rule kind: everything. Expected filter or diagnosis.']);
  });
});

describe('runwatch reset', () => {
  it('refuses without --yes', async () => {
    expect(await runResetCommand([], { config })).toBe(1);
    expect(console_.err).toEqual(['Refusing to reset without --yes']);
  });

  it('clears rules and the retrieval store', async () => {
    const fileConfig = cliConfig(rulesDir, { dbPath: join(dir, 'runwatch.db') });
    await runRunCommand([logFile, '--json'], { config: fileConfig, overrides: overrides() });

    const code = await runResetCommand(['--yes'], { config: fileConfig });

    expect(code).toBe(0);
    expect(console_.out[console_.out.length - 1]).toBe(
      '✓ Cleared 0 filter rules, 1 diagnosis rules and 1 failure records',
    );
    expect(new RuleStore(rulesDir).load().diagnosisRules).toEqual([]);
  });
});
