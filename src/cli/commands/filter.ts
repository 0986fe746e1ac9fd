import { Command, InvalidArgumentError, Option } from 'commander';
import { DEFAULT_OUTPUT_DIR } from '../../core/config/constants.js';
import { rangeForDay, rangeForDaysBack, type RangeSpec } from '../../core/dates/range.js';
import { ErrorCode, FilterError, describeError } from '../../core/errors.js';
import { createConsoleLogger } from '../../core/logging/logger.js';
import { BackupFilter } from '../../core/orchestrator.js';

export interface FilterCommandOptions {
  backupDir: string;
  outputDir: string;
  start?: string;
  end?: string;
  date?: string;
  days?: number;
  json: boolean;
  verbose: boolean;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive whole number of days.');
  }
  return parsed;
}

/** Turns the mutually exclusive range options into start/end strings. */
export function resolveRangeSpec(options: FilterCommandOptions, now: Date = new Date()): RangeSpec {
  if (options.start !== undefined) {
    if (options.end === undefined) {
      throw new FilterError(ErrorCode.INVALID_ARGUMENTS, '--end is required when using --start');
    }
    return { start: options.start, end: options.end };
  }

  if (options.end !== undefined) {
    throw new FilterError(ErrorCode.INVALID_ARGUMENTS, '--end can only be used with --start');
  }
  if (options.date !== undefined) {
    return rangeForDay(options.date);
  }
  if (options.days !== undefined) {
    return rangeForDaysBack(options.days, now);
  }

  throw new FilterError(ErrorCode.INVALID_ARGUMENTS, 'Must specify --start/--end, --date, or --days');
}

export function registerFilterCommand(program: Command): void {
  program
    .requiredOption('--backup-dir <dir>', 'Path to the backup root directory')
    .option('--output-dir <dir>', 'Output directory for the filtered backup', DEFAULT_OUTPUT_DIR)
    .addOption(
      new Option('--start <datetime>', 'Start date/time (YYYY-MM-DD HH:MM:SS)').conflicts(['date', 'days'])
    )
    .addOption(new Option('--end <datetime>', 'End date/time (YYYY-MM-DD HH:MM:SS), required with --start'))
    .addOption(
      new Option('--date <day>', 'Single day to filter (YYYY-MM-DD), full day').conflicts(['start', 'days'])
    )
    .addOption(
      new Option('--days <n>', 'Number of days back from today')
        .argParser(parsePositiveInt)
        .conflicts(['start', 'date'])
    )
    .option('--json', 'Print the summary as JSON to stdout', false)
    .option('--verbose', 'Verbose output', false)
    .action(async (options: FilterCommandOptions) => {
      const logger = createConsoleLogger({ verbose: options.verbose, toStderr: options.json });

      try {
        const bounds = resolveRangeSpec(options);
        logger.info(`Date range: ${bounds.start} to ${bounds.end}`);

        const filter = new BackupFilter({
          sourceDir: options.backupDir,
          outputDir: options.outputDir,
          logger,
        });
        const summary = await filter.run(bounds);

        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
        }
      } catch (error) {
        console.error('Error:', describeError(error));
        if (error instanceof FilterError && error.suggestion) {
          console.error('Hint:', error.suggestion);
        }
        process.exit(1);
      }
    });
}
