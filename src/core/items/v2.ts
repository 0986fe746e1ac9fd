import * as path from 'path';
import { JSON_SUFFIX } from '../config/constants.js';
import { overlapsRange } from '../dates/range.js';
import { parseNaiveInstant } from '../dates/parser.js';
import { describeReadFailure, fileSize, readJsonFile, writeJsonFile } from '../io/files.js';
import { extractPlaceId, itemSpanFields, toV2Item } from '../records.js';
import { OutcomeTally, excluded, skipped, written } from '../report.js';
import type { DateRange } from '../types/index.js';
import type { ItemFileResult, ItemFilterOptions, ItemFilterReport } from './types.js';

/** `YYYY-MM.json` for every calendar month from the range's start through its end. */
export function monthFileNames(range: DateRange): string[] {
  const start = new Date(range.start);
  const end = new Date(range.end);
  const names: string[] = [];

  let year = start.getUTCFullYear();
  let month = start.getUTCMonth();
  const lastYear = end.getUTCFullYear();
  const lastMonth = end.getUTCMonth();

  while (year < lastYear || (year === lastYear && month <= lastMonth)) {
    names.push(`${String(year).padStart(4, '0')}-${String(month + 1).padStart(2, '0')}${JSON_SUFFIX}`);
    month += 1;
    if (month === 12) {
      month = 0;
      year += 1;
    }
  }

  return names;
}

export async function processV2MonthFile(
  sourceFile: string,
  outputFile: string,
  range: DateRange
): Promise<ItemFileResult> {
  const label = path.basename(sourceFile);

  try {
    const size = await fileSize(sourceFile);
    if (size === undefined) {
      return { outcome: excluded(label), placeIds: [] };
    }
    if (size === 0) {
      return { outcome: skipped(label, 'empty file', 'debug'), placeIds: [] };
    }

    let parsed: unknown;
    try {
      parsed = await readJsonFile(sourceFile);
    } catch (error) {
      return { outcome: skipped(label, describeReadFailure(error)), placeIds: [] };
    }

    if (!Array.isArray(parsed)) {
      return { outcome: skipped(label, 'expected a JSON array, treating as empty'), placeIds: [] };
    }

    const kept: unknown[] = [];
    const placeIds: string[] = [];

    for (const raw of parsed) {
      const item = toV2Item(raw);
      if (!item) continue;

      const { startDate, endDate } = itemSpanFields(item);
      const start = parseNaiveInstant(startDate);
      const end = parseNaiveInstant(endDate);
      if (start === undefined || end === undefined || !overlapsRange(start, end, range)) {
        continue;
      }

      kept.push(raw);
      const placeId = extractPlaceId(item);
      if (placeId) placeIds.push(placeId);
    }

    if (kept.length === 0) {
      return { outcome: excluded(label), placeIds };
    }

    await writeJsonFile(outputFile, kept);
    return { outcome: written(label, kept.length), placeIds };
  } catch (error) {
    return { outcome: skipped(label, describeReadFailure(error)), placeIds: [] };
  }
}

/** Rewrites each month file the range touches with only its overlapping items. */
export async function filterV2Items(options: ItemFilterOptions): Promise<ItemFilterReport> {
  const { sourceDir, outputDir, range, logger } = options;
  const placeIds = new Set<string>();
  const tally = new OutcomeTally(logger);

  for (const fileName of monthFileNames(range)) {
    const result = await processV2MonthFile(
      path.join(sourceDir, fileName),
      path.join(outputDir, fileName),
      range
    );
    tally.record(result.outcome);
    result.placeIds.forEach((id) => placeIds.add(id));
  }

  return { itemCount: tally.records, fileCount: tally.files, placeIds, skipped: tally.skips };
}
