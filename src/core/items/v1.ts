import * as fs from 'fs/promises';
import * as path from 'path';
import { JSON_SUFFIX } from '../config/constants.js';
import { overlapsRange } from '../dates/range.js';
import { parseNaiveInstant } from '../dates/parser.js';
import { copyFileVerbatim, describeReadFailure, listDirectories, listFiles } from '../io/files.js';
import { toV1Item } from '../records.js';
import { OutcomeTally, excluded, skipped, written } from '../report.js';
import type { DateRange, SkipRecord } from '../types/index.js';
import type { ItemFileResult, ItemFilterOptions, ItemFilterReport } from './types.js';

export async function processV1ItemFile(
  sourceFile: string,
  outputFile: string,
  range: DateRange
): Promise<ItemFileResult> {
  const label = path.basename(sourceFile);

  try {
    if ((await fs.stat(sourceFile)).size === 0) {
      return { outcome: skipped(label, 'empty file', 'debug'), placeIds: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(await fs.readFile(sourceFile, 'utf-8'));
    } catch (error) {
      return { outcome: skipped(label, describeReadFailure(error)), placeIds: [] };
    }

    const item = toV1Item(parsed);
    if (!item) {
      return { outcome: skipped(label, 'expected a JSON object'), placeIds: [] };
    }

    const start = parseNaiveInstant(item.startDate);
    const end = parseNaiveInstant(item.endDate);
    if (start === undefined || end === undefined || !overlapsRange(start, end, range)) {
      return { outcome: excluded(label), placeIds: [] };
    }

    await copyFileVerbatim(sourceFile, outputFile);

    const placeIds = item.isVisit && item.placeId ? [item.placeId] : [];
    return { outcome: written(label, 1), placeIds };
  } catch (error) {
    return { outcome: skipped(label, describeReadFailure(error)), placeIds: [] };
  }
}

/** Copies every loose item file in TimelineItem/<bucket>/ whose span overlaps the range. */
export async function filterV1Items(options: ItemFilterOptions): Promise<ItemFilterReport> {
  const { sourceDir, outputDir, range, logger } = options;
  const placeIds = new Set<string>();
  let itemCount = 0;
  let bucketCount = 0;
  const skippedFiles: SkipRecord[] = [];

  for (const bucket of await listDirectories(sourceDir)) {
    const tally = new OutcomeTally(logger);

    for (const fileName of await listFiles(path.join(sourceDir, bucket), JSON_SUFFIX)) {
      const result = await processV1ItemFile(
        path.join(sourceDir, bucket, fileName),
        path.join(outputDir, bucket, fileName),
        range
      );
      tally.record(result.outcome);
      result.placeIds.forEach((id) => placeIds.add(id));
    }

    if (tally.records > 0) {
      logger.debug(`Bucket ${bucket}: ${tally.records} items`);
      bucketCount += 1;
    }
    itemCount += tally.records;
    skippedFiles.push(...tally.skips);
  }

  return { itemCount, fileCount: bucketCount, placeIds, skipped: skippedFiles };
}
