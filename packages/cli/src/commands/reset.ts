/**
 * runwatch reset — forget every learned rule and indexed failure
 */
import { parseArgs } from 'node:util';
import { createPipeline } from '@runwatch/server';
import { type CommandContext, resolveConfig } from '../lib/context.js';

const HELP = `Usage: runwatch reset --yes

Delete both rule files and every record in the retrieval store.

Options:
  --yes                 Confirm the reset
  -h, --help            Show help`;

export async function runResetCommand(argv: string[], ctx: CommandContext = {}): Promise<number> {
  const { values } = parseArgs({
    args: argv,
    options: {
      yes: { type: 'boolean', short: 'y', default: false },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }
  if (!values.yes) {
    console.error('Refusing to reset without --yes');
    return 1;
  }

  const pipeline = createPipeline(resolveConfig(ctx), ctx.overrides);
  const filterRules = pipeline.rules.filterRules.length;
  const diagnosisRules = pipeline.rules.diagnosisRules.length;
  const failureRecords = pipeline.retrieval.count();

  await pipeline.reset();

  console.log(
    `✓ Cleared ${filterRules} filter rules, ${diagnosisRules} diagnosis rules and ${failureRecords} failure records`,
  );
  return 0;
}
