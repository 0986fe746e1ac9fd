import * as fs from 'fs/promises';
import * as path from 'path';
import { SUMMARY_RULE } from './config/constants.js';
import { LAYOUT_CONFIGS } from './config/layouts.js';
import { formatNaiveInstant } from './dates/parser.js';
import { formatRange, parseDateRange, type RangeSpec } from './dates/range.js';
import { detectLayout } from './detect/format.js';
import { ErrorCode, FilterError, describeError } from './errors.js';
import { isDirectory } from './io/files.js';
import { filterItems } from './items/index.js';
import type { Logger } from './logging/logger.js';
import { resolvePlaces } from './places/resolver.js';
import { filterSamples } from './samples/filter.js';
import type { BackupLayout, SkipRecord } from './types/index.js';

export interface BackupFilterOptions {
  sourceDir: string;
  outputDir: string;
  logger: Logger;
}

export interface FilterSummary {
  layout: BackupLayout;
  sourceDir: string;
  outputDir: string;
  range: { start: string; end: string };
  items: number;
  samples: number;
  places: number;
  skipped: SkipRecord[];
  durationMs: number;
}

interface LayoutPaths {
  itemDir: string;
  sampleDir: string;
  placeDir: string;
}

function layoutPaths(root: string, layout: BackupLayout): LayoutPaths {
  const config = LAYOUT_CONFIGS[layout];
  return {
    itemDir: path.join(root, config.itemDir),
    sampleDir: path.join(root, config.sampleDir),
    placeDir: path.join(root, config.placeDir),
  };
}

export class BackupFilter {
  private readonly sourceDir: string;
  private readonly outputDir: string;
  private readonly logger: Logger;

  constructor(options: BackupFilterOptions) {
    this.sourceDir = options.sourceDir;
    this.outputDir = options.outputDir;
    this.logger = options.logger;
  }

  async run(bounds: RangeSpec): Promise<FilterSummary> {
    const startTime = Date.now();

    this.logger.info(SUMMARY_RULE);
    this.logger.info('Starting backup filter operation');
    this.logger.info(`Source: ${this.sourceDir}`);
    this.logger.info(`Output: ${this.outputDir}`);
    this.logger.info(SUMMARY_RULE);

    try {
      const range = parseDateRange(bounds);
      const layout = await detectLayout(this.sourceDir, this.logger);
      this.logger.info(`Detected layout: ${LAYOUT_CONFIGS[layout].name}`);

      const source = layoutPaths(this.sourceDir, layout);
      await this.ensureStorage(source);

      const output = layoutPaths(this.outputDir, layout);
      await fs.mkdir(output.itemDir, { recursive: true });
      await fs.mkdir(output.sampleDir, { recursive: true });
      await fs.mkdir(output.placeDir, { recursive: true });

      this.logger.info(`Filtering timeline items from ${formatRange(range)}`);
      const items = await filterItems(layout, {
        sourceDir: source.itemDir,
        outputDir: output.itemDir,
        range,
        logger: this.logger,
      });

      this.logger.info(`Filtering locomotion samples from ${formatRange(range)}`);
      const samples = await filterSamples({
        sourceDir: source.sampleDir,
        outputDir: output.sampleDir,
        range,
        logger: this.logger,
      });

      const places = await resolvePlaces(layout, {
        placeIds: items.placeIds,
        sourceDir: source.placeDir,
        outputDir: output.placeDir,
        logger: this.logger,
      });

      const summary: FilterSummary = {
        layout,
        sourceDir: this.sourceDir,
        outputDir: this.outputDir,
        range: { start: formatNaiveInstant(range.start), end: formatNaiveInstant(range.end) },
        items: items.itemCount,
        samples: samples.sampleCount,
        places: places.placeCount,
        skipped: [...items.skipped, ...samples.skipped, ...places.skipped],
        durationMs: Date.now() - startTime,
      };

      this.logSummary(summary);
      return summary;
    } catch (error) {
      this.logger.error(`✗ Filter operation failed: ${describeError(error)}`);
      throw error;
    }
  }

  private async ensureStorage(source: LayoutPaths): Promise<void> {
    for (const dir of [source.itemDir, source.sampleDir]) {
      if (!(await isDirectory(dir))) {
        throw new FilterError(
          ErrorCode.MISSING_STORAGE,
          `Storage directory not found: ${dir}`,
          undefined,
          { dir }
        );
      }
    }
  }

  private logSummary(summary: FilterSummary): void {
    this.logger.info(SUMMARY_RULE);
    this.logger.info('✓ Filter operation completed successfully!');
    this.logger.info(`  Timeline items: ${summary.items}`);
    this.logger.info(`  Locomotion samples: ${summary.samples}`);
    this.logger.info(`  Places: ${summary.places}`);
    this.logger.info(`  Skipped files: ${summary.skipped.length}`);
    this.logger.info(`  Output directory: ${summary.outputDir}`);
    this.logger.info(SUMMARY_RULE);
  }
}
