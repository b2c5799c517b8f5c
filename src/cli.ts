#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { assessCommand, summarizeCommand, type CommandDeps } from './commands.js';
import { loadConfig } from './config.js';
import { logger } from './logger.js';
import { createPrompter } from './prompt.js';

async function main(): Promise<number> {
  const config = loadConfig();
  logger.setLevel(config.logLevel);
  const deps: CommandDeps = { config, prompter: () => createPrompter() };

  let exitCode = 0;
  await yargs(hideBin(process.argv))
    .scriptName('posture-report')
    .command(
      'assess',
      'Run the posture checklist against one region',
      (y) =>
        y
          .option('checklist', { type: 'string', default: 'baseline', describe: 'Checklist id' })
          .option('region', { type: 'string', describe: 'Region to assess (prompted when omitted)' })
          .option('vpcs', {
            type: 'string',
            describe: "In-scope VPC ids, comma-separated, or 'all' (prompted when omitted)",
          })
          .option('out', { type: 'string', describe: 'Directory for the report files' })
          .option('yes', {
            type: 'boolean',
            default: false,
            describe: 'Continue without asking when permissions are insufficient',
          })
          .option('threshold', { type: 'number', describe: 'Permission gate threshold (0-100)' }),
      async (argv) => {
        exitCode = await assessCommand(argv, deps);
      },
    )
    .command(
      'summarize',
      'Consolidate saved JSON reports into an executive summary',
      (y) =>
        y
          .option('dir', { type: 'string', describe: 'Directory holding JSON reports' })
          .option('out', { type: 'string', describe: 'Directory for the summary files' }),
      async (argv) => {
        exitCode = await summarizeCommand(argv, deps);
      },
    )
    .demandCommand(1)
    .strict()
    .fail(false)
    .help()
    .parseAsync();

  return exitCode;
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    logger.error('posture-report failed', err);
    process.exitCode = 2;
  },
);
