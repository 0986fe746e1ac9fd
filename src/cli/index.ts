#!/usr/bin/env node

import { Command } from 'commander';
import { describeError } from '../core/errors.js';
import { registerFilterCommand } from './commands/filter.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('locobackup-filter')
    .description('Copy the part of a location-history backup inside a date range into a new backup')
    .version('0.1.0');

  registerFilterCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Fatal error:', describeError(error));
    process.exit(1);
  });
}
