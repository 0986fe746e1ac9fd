import * as path from 'path';
import { SAMPLE_FILE_SUFFIX } from '../config/constants.js';
import { isoWeekSpan, parseWeekFileName } from '../dates/iso-week.js';
import { parseNaiveInstant } from '../dates/parser.js';
import { containsInstant, overlapsRange } from '../dates/range.js';
import { describeReadFailure, fileSize, listFiles, readGzipJsonFile, writeGzipJsonFile } from '../io/files.js';
import type { Logger } from '../logging/logger.js';
import { toSample } from '../records.js';
import { OutcomeTally, excluded, skipped, written } from '../report.js';
import type { DateRange, FileOutcome, SkipRecord } from '../types/index.js';

export interface SampleFilterOptions {
  sourceDir: string;
  outputDir: string;
  range: DateRange;
  logger: Logger;
}

export interface SampleFilterReport {
  sampleCount: number;
  weekCount: number;
  skipped: SkipRecord[];
}

export interface WeekFileSelection {
  files: string[];
  skipped: FileOutcome[];
}

/** Week files, by name, whose ISO week overlaps the range. */
export function selectWeekFiles(fileNames: string[], range: DateRange): WeekFileSelection {
  const files: string[] = [];
  const skippedNames: FileOutcome[] = [];

  for (const fileName of fileNames) {
    const week = parseWeekFileName(fileName);
    if (!week) {
      skippedNames.push(skipped(fileName, 'could not parse week file name'));
      continue;
    }

    const span = isoWeekSpan(week);
    if (overlapsRange(span.start, span.end, range)) {
      files.push(fileName);
    }
  }

  return { files, skipped: skippedNames };
}

export async function processWeekFile(
  sourceFile: string,
  outputFile: string,
  range: DateRange
): Promise<FileOutcome> {
  const label = path.basename(sourceFile);

  try {
    if ((await fileSize(sourceFile)) === 0) {
      return skipped(label, 'empty file', 'debug');
    }

    let parsed: unknown;
    try {
      parsed = await readGzipJsonFile(sourceFile);
    } catch (error) {
      return skipped(label, describeReadFailure(error));
    }

    if (!Array.isArray(parsed)) {
      return skipped(label, 'expected a JSON array');
    }

    const kept = parsed.filter((raw) => {
      const instant = parseNaiveInstant(toSample(raw)?.date);
      return instant !== undefined && containsInstant(range, instant);
    });

    if (kept.length === 0) {
      return excluded(label);
    }

    await writeGzipJsonFile(outputFile, kept);
    return written(label, kept.length);
  } catch (error) {
    return skipped(label, describeReadFailure(error));
  }
}

/** Rewrites each overlapping week file with only the samples timestamped inside the range. */
export async function filterSamples(options: SampleFilterOptions): Promise<SampleFilterReport> {
  const { sourceDir, outputDir, range, logger } = options;
  const tally = new OutcomeTally(logger);

  const selection = selectWeekFiles(await listFiles(sourceDir, SAMPLE_FILE_SUFFIX), range);
  selection.skipped.forEach((outcome) => tally.record(outcome));

  logger.info(`Processing ${selection.files.length} week files`);

  for (const fileName of selection.files) {
    tally.record(
      await processWeekFile(path.join(sourceDir, fileName), path.join(outputDir, fileName), range)
    );
  }

  logger.info(`Filtered ${tally.records} locomotion samples from ${tally.files} week files`);
  return { sampleCount: tally.records, weekCount: tally.files, skipped: tally.skips };
}
