#!/usr/bin/env node
/**
 * @runwatch/cli — Command-line interface for runwatch
 *
 * Uses node:util parseArgs for lightweight argument parsing.
 */

import { RunwatchError } from '@runwatch/core';
import { runRunCommand } from './commands/run.js';
import { runValidateCommand } from './commands/validate.js';
import { runResetCommand } from './commands/reset.js';
import { runRulesCommand } from './commands/rules.js';
import { runServeCommand } from './commands/serve.js';

const HELP = `runwatch — failure diagnosis for training-job logs

Usage: runwatch <command> [options]

Commands:
  run <log-file>      Filter and diagnose a log file, learning rules as it goes
  validate            Check configuration and storage
  reset --yes         Clear learned rules and the retrieval store
  rules [kind]        List learned filter and diagnosis rules
  serve               Start the HTTP API

Run "runwatch <command> --help" for command-specific help.

Configuration is read from the environment:
  RUNWATCH_LLM_API_KEY=... runwatch run train.log
`;

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];
  const rest = args.slice(1);

  switch (command) {
    case 'run':
      return runRunCommand(rest);

    case 'validate':
      return runValidateCommand(rest);

    case 'reset':
      return runResetCommand(rest);

    case 'rules':
      return runRulesCommand(rest);

    case 'serve':
      return runServeCommand(rest);

    case '--help':
    case '-h':
    case undefined:
      console.log(HELP);
      return 0;

    case '--version':
    case '-v':
      console.log('0.1.0');
      return 0;

    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      return 1;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    if (err instanceof RunwatchError) {
      console.error(`Error [${err.code}]: ${err.message}`);
    } else if (err instanceof Error) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(`Error: ${String(err)}`);
    }
    process.exitCode = 1;
  },
);
