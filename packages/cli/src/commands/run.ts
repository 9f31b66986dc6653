/**
 * runwatch run — diagnose a training log file end to end
 */
import { parseArgs } from 'node:util';
import { existsSync } from 'node:fs';
import type { DiagnosisOutcome } from '@runwatch/core';
import { createPipeline, readLogChunks, validateConfig, type RunSummary } from '@runwatch/server';
import { type CommandContext, parsePositiveInt, resolveConfig } from '../lib/context.js';
import { formatOutcome, printJson } from '../lib/output.js';

const HELP = `Usage: runwatch run <log-file> [options]

Stream a log file through the filter, diagnose every failure and learn new rules.

Options:
  --chunk-size <n>      Lines per chunk (default: RUNWATCH_CHUNK_SIZE or 20)
  --job <id>            Job id recorded with indexed failures (default: generated)
  --json                Print the run summary as JSON instead of text
  -h, --help            Show help

Examples:
  runwatch run logs/train-rank0.log
  runwatch run logs/train.log --chunk-size 100 --job pretrain-7b`;

export function formatSummary(summary: RunSummary): string[] {
  const { byTier } = summary;
  return [
    `Processed ${summary.lines} lines in ${summary.chunks} chunks (job ${summary.jobId})`,
    `  suppressed: ${summary.suppressed}  unfiltered: ${summary.unfiltered}  failures: ${summary.failures} (rule ${byTier.rule}, reasoning ${byTier.reasoning}, fallback ${byTier.fallback})`,
    `  learned: ${summary.filterRulesLearned} filter rules, ${summary.diagnosisRulesLearned} diagnosis rules`,
  ];
}

export async function runRunCommand(argv: string[], ctx: CommandContext = {}): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      'chunk-size': { type: 'string' },
      job: { type: 'string' },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const logFile = positionals[0];
  if (!logFile) {
    console.error('Missing <log-file>');
    console.log(HELP);
    return 1;
  }
  if (!existsSync(logFile)) {
    console.error(`Log file not found: ${logFile}`);
    return 1;
  }

  const config = resolveConfig(ctx);
  const chunkSize = parsePositiveInt('chunk-size', values['chunk-size'], config.chunkSize);
  if (chunkSize === null) return 1;
  validateConfig(config, { requireLlm: true });

  const pipeline = createPipeline(config, ctx.overrides);
  const orchestrator = pipeline.createOrchestrator(values.job);

  if (!values.json) {
    orchestrator.on('diagnosis', (outcome: DiagnosisOutcome) => {
      for (const text of formatOutcome(outcome)) console.log(text);
    });
    orchestrator.on('rule', (learned) => {
      console.log(`  learned ${learned.kind} rule ${learned.ruleId}: /${learned.pattern}/`);
    });
  }

  const summary = await orchestrator.run(readLogChunks(logFile, chunkSize));

  if (values.json) {
    printJson(summary);
  } else {
    for (const text of formatSummary(summary)) console.log(text);
  }
  return 0;
}
