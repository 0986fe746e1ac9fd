import * as path from 'path';
import { JSON_SUFFIX } from '../config/constants.js';
import {
  copyFileVerbatim,
  describeReadFailure,
  fileSize,
  isDirectory,
  readJsonFile,
  writeJsonFile,
} from '../io/files.js';
import type { Logger } from '../logging/logger.js';
import { toPlace } from '../records.js';
import { OutcomeTally, excluded, skipped, written } from '../report.js';
import type { BackupLayout, FileOutcome, SkipRecord } from '../types/index.js';

export interface PlaceResolverOptions {
  placeIds: ReadonlySet<string>;
  sourceDir: string;
  outputDir: string;
  logger: Logger;
}

export interface PlaceResolverReport {
  placeCount: number;
  skipped: SkipRecord[];
}

/** Uppercased first character of the id; `undefined` for an empty id. */
export function placeBucket(placeId: string): string | undefined {
  const [first] = Array.from(placeId);
  return first?.toUpperCase();
}

/** Whether `name` can be used as a single file name inside a bucket. */
export function isPlainFileStem(name: string): boolean {
  return name !== '' && name !== '.' && name !== '..' && !/[/\\\0]/.test(name);
}

export async function copyV1Place(placeId: string, sourceDir: string, outputDir: string): Promise<FileOutcome> {
  const bucket = placeBucket(placeId);
  if (bucket === undefined) {
    return skipped('(empty id)', 'place id is empty');
  }

  const fileName = `${placeId}${JSON_SUFFIX}`;
  const label = `${bucket}/${fileName}`;

  if (!isPlainFileStem(placeId) || !isPlainFileStem(bucket)) {
    return skipped(label, `place id is not a plain file name: ${placeId}`);
  }

  try {
    const source = path.join(sourceDir, bucket, fileName);
    if ((await fileSize(source)) === undefined) {
      return skipped(label, `place file not found: ${placeId}`, 'debug');
    }

    await copyFileVerbatim(source, path.join(outputDir, bucket, fileName));
    return written(label, 1);
  } catch (error) {
    return skipped(label, `error copying place ${placeId}: ${describeReadFailure(error)}`);
  }
}

export async function filterV2PlaceBucket(
  bucket: string,
  placeIds: ReadonlySet<string>,
  sourceDir: string,
  outputDir: string
): Promise<FileOutcome> {
  const fileName = `${bucket}${JSON_SUFFIX}`;
  if (!isPlainFileStem(bucket)) {
    return skipped(fileName, `place bucket is not a plain file name: ${bucket}`);
  }
  const source = path.join(sourceDir, fileName);

  try {
    const size = await fileSize(source);
    if (size === undefined) {
      return skipped(fileName, 'place bucket file not found', 'debug');
    }
    if (size === 0) {
      return skipped(fileName, 'empty file', 'debug');
    }

    let parsed: unknown;
    try {
      parsed = await readJsonFile(source);
    } catch (error) {
      return skipped(fileName, describeReadFailure(error));
    }

    if (!Array.isArray(parsed)) {
      return skipped(fileName, 'expected a JSON array, treating as empty');
    }

    const kept = parsed.filter((raw) => {
      const id = toPlace(raw)?.id;
      return typeof id === 'string' && placeIds.has(id);
    });

    if (kept.length === 0) {
      return excluded(fileName);
    }

    await writeJsonFile(path.join(outputDir, fileName), kept);
    return written(fileName, kept.length);
  } catch (error) {
    return skipped(fileName, describeReadFailure(error));
  }
}

/** Copies only the place records referenced by surviving items. */
export async function resolvePlaces(
  layout: BackupLayout,
  options: PlaceResolverOptions
): Promise<PlaceResolverReport> {
  const { placeIds, sourceDir, outputDir, logger } = options;

  if (!(await isDirectory(sourceDir))) {
    logger.warn(`Place directory not found in backup: ${sourceDir}`);
    return { placeCount: 0, skipped: [] };
  }

  logger.info(`Copying ${placeIds.size} place records`);

  const tally = new OutcomeTally(logger);
  const sortedIds = Array.from(placeIds).sort();

  if (layout === 'v1') {
    for (const placeId of sortedIds) {
      tally.record(await copyV1Place(placeId, sourceDir, outputDir));
    }
  } else {
    const buckets = new Set<string>();
    for (const placeId of sortedIds) {
      const bucket = placeBucket(placeId);
      if (bucket === undefined) {
        tally.record(skipped('(empty id)', 'place id is empty'));
      } else {
        buckets.add(bucket);
      }
    }

    for (const bucket of Array.from(buckets).sort()) {
      tally.record(await filterV2PlaceBucket(bucket, placeIds, sourceDir, outputDir));
    }
  }

  logger.info(`Copied ${tally.records} place records`);
  return { placeCount: tally.records, skipped: tally.skips };
}
