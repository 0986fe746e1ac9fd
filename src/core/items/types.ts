import type { Logger } from '../logging/logger.js';
import type { DateRange, FileOutcome, SkipRecord } from '../types/index.js';

export interface ItemFilterOptions {
  sourceDir: string;
  outputDir: string;
  range: DateRange;
  logger: Logger;
}

export interface ItemFilterReport {
  itemCount: number;
  /** V1 buckets or V2 month files that received at least one item. */
  fileCount: number;
  placeIds: Set<string>;
  skipped: SkipRecord[];
}

export interface ItemFileResult {
  outcome: FileOutcome;
  placeIds: string[];
}
