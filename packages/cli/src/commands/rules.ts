/**
 * runwatch rules — list learned rules
 */
import { parseArgs } from 'node:util';
import { RuleStore } from '@runwatch/server';
import { type CommandContext, resolveConfig } from '../lib/context.js';
import { formatTimestamp, printJson, printTable, truncate } from '../lib/output.js';

const HELP = `Usage: runwatch rules [filter|diagnosis] [options]

List the learned rules, oldest first. Shows both collections when no kind is given.

Options:
  --json                Output raw JSON
  -h, --help            Show help`;

const KINDS = ['filter', 'diagnosis'] as const;
type RuleKind = (typeof KINDS)[number];

function isRuleKind(value: string): value is RuleKind {
  return KINDS.some((k) => k === value);
}

export function runRulesCommand(argv: string[], ctx: CommandContext = {}): number {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const requested = positionals[0];
  if (requested !== undefined && !isRuleKind(requested)) {
    console.error(`Unknown rule kind: ${requested}. Expected filter or diagnosis.`);
    return 1;
  }
  const kinds: readonly RuleKind[] = requested ? [requested] : KINDS;

  const { filterRules, diagnosisRules } = new RuleStore(resolveConfig(ctx).rulesDir).load();

  if (values.json) {
    printJson({
      ...(kinds.includes('filter') ? { filter: filterRules } : {}),
      ...(kinds.includes('diagnosis') ? { diagnosis: diagnosisRules } : {}),
    });
    return 0;
  }

  if (kinds.includes('filter')) {
    console.log(`Filter rules (${filterRules.length})`);
    printTable(
      ['ID', 'Pattern', 'Hits', 'Created', 'Description'],
      filterRules.map((r) => [r.id, truncate(r.pattern, 48), String(r.hitCount), formatTimestamp(r.createdAt), truncate(r.description, 40)]),
    );
  }
  if (kinds.includes('diagnosis')) {
    if (kinds.length > 1) console.log('');
    console.log(`Diagnosis rules (${diagnosisRules.length})`);
    printTable(
      ['ID', 'Pattern', 'Error type', 'Source', 'Recoverable', 'Matches'],
      diagnosisRules.map((r) => [
        r.id,
        truncate(r.pattern, 48),
        r.template.errorType,
        r.template.source,
        r.template.isRecoverable ? 'yes' : 'no',
        String(r.matchCount),
      ]),
    );
  }
  return 0;
}
