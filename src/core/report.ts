import type { Logger } from './logging/logger.js';
import type { FileOutcome, SkipLevel, SkipRecord } from './types/index.js';

export function skipped(file: string, reason: string, level: SkipLevel = 'warn'): FileOutcome {
  return { status: 'skipped', file, reason, level };
}

export function excluded(file: string): FileOutcome {
  return { status: 'excluded', file };
}

export function written(file: string, count: number): FileOutcome {
  return { status: 'written', file, count };
}

/**
 * Folds per-file outcomes into counts. Each skip is logged once, at its own
 * severity, as it is recorded.
 */
export class OutcomeTally {
  records = 0;
  files = 0;
  readonly skips: SkipRecord[] = [];

  constructor(private readonly logger: Logger) {}

  record(outcome: FileOutcome): void {
    switch (outcome.status) {
      case 'written':
        this.records += outcome.count;
        this.files += 1;
        this.logger.debug(`${outcome.file}: ${outcome.count} records`);
        return;
      case 'excluded':
        return;
      case 'skipped': {
        const message = `Skipping ${outcome.file}: ${outcome.reason}`;
        if (outcome.level === 'warn') {
          this.logger.warn(message);
        } else {
          this.logger.debug(message);
        }
        this.skips.push({ file: outcome.file, reason: outcome.reason, level: outcome.level });
      }
    }
  }
}
