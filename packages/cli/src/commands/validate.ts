/**
 * runwatch validate — check configuration and storage before a run
 */
import { parseArgs } from 'node:util';
import { accessSync, constants, mkdirSync } from 'node:fs';
import { getErrorMessage } from '@runwatch/core';
import { RuleStore, listConfigProblems, type RunwatchConfig } from '@runwatch/server';
import { type CommandContext, resolveConfig } from '../lib/context.js';

const HELP = `Usage: runwatch validate

Check the configuration, the rules directory and the rule files.
Exits with status 1 when any check fails.`;

export interface Check {
  name: string;
  ok: boolean;
  detail: string;
}

function check(name: string, fn: () => string): Check {
  try {
    return { name, ok: true, detail: fn() };
  } catch (err: unknown) {
    return { name, ok: false, detail: getErrorMessage(err) };
  }
}

export function runChecks(config: RunwatchConfig): Check[] {
  const problems = listConfigProblems(config);
  const checks: Check[] = [
    {
      name: 'LLM credentials',
      ok: config.llm !== null,
      detail: config.llm ? `${config.llm.provider}${config.llm.model ? ` (${config.llm.model})` : ''}` : 'RUNWATCH_LLM_API_KEY is not set',
    },
    {
      name: 'Settings',
      ok: problems.length === 0,
      detail: problems.length === 0 ? 'all values in range' : problems.join('; '),
    },
    check('Rules directory', () => {
      mkdirSync(config.rulesDir, { recursive: true });
      accessSync(config.rulesDir, constants.W_OK);
      return `${config.rulesDir} is writable`;
    }),
  ];

  const store = new RuleStore(config.rulesDir);
  checks.push(
    check('Rule files', () => {
      const { filterRules, diagnosisRules } = store.load();
      return `${filterRules.length} filter rules, ${diagnosisRules.length} diagnosis rules`;
    }),
  );
  return checks;
}

export function runValidateCommand(argv: string[], ctx: CommandContext = {}): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  let config: RunwatchConfig;
  try {
    config = resolveConfig(ctx);
  } catch (err: unknown) {
    console.log(`❌ Configuration: ${getErrorMessage(err)}`);
    return 1;
  }

  const checks = runChecks(config);
  for (const c of checks) {
    console.log(`${c.ok ? '✅' : '❌'} ${c.name}: ${c.detail}`);
  }
  return checks.every((c) => c.ok) ? 0 : 1;
}
