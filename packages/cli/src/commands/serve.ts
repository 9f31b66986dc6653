/**
 * runwatch serve — start the HTTP API
 */
import { parseArgs } from 'node:util';
import { startServer } from '@runwatch/server';
import { type CommandContext, parsePositiveInt, resolveConfig } from '../lib/context.js';

const HELP = `Usage: runwatch serve [options]

Start the HTTP API (health, rules, diagnose and failure search).

Options:
  --port <n>            Port to listen on (default: PORT or 3500)
  -h, --help            Show help`;

export function runServeCommand(argv: string[], ctx: CommandContext = {}): number {
  const { values } = parseArgs({
    args: argv,
    options: {
      port: { type: 'string', short: 'p' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    allowPositionals: false,
  });

  if (values.help) {
    console.log(HELP);
    return 0;
  }

  const config = resolveConfig(ctx);
  const port = parsePositiveInt('port', values.port, config.port);
  if (port === null) return 1;

  startServer({ ...config, port }, ctx.overrides);
  return 0;
}
