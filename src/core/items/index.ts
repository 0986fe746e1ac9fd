import type { BackupLayout } from '../types/index.js';
import type { ItemFilterOptions, ItemFilterReport } from './types.js';
import { filterV1Items } from './v1.js';
import { filterV2Items } from './v2.js';

export type { ItemFilterOptions, ItemFilterReport } from './types.js';

export async function filterItems(layout: BackupLayout, options: ItemFilterOptions): Promise<ItemFilterReport> {
  const report = layout === 'v1' ? await filterV1Items(options) : await filterV2Items(options);

  const unit = layout === 'v1' ? 'buckets' : 'month files';
  options.logger.info(`Filtered ${report.itemCount} timeline items from ${report.fileCount} ${unit}`);
  options.logger.info(`Found ${report.placeIds.size} unique place IDs`);
  return report;
}
