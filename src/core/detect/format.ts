import * as path from 'path';
import { LAYOUT_CONFIGS, layoutMarkers } from '../config/layouts.js';
import { ErrorCode, FilterError } from '../errors.js';
import { pathExists } from '../io/files.js';
import type { Logger } from '../logging/logger.js';
import type { BackupLayout } from '../types/index.js';

async function hasMarkers(root: string, layout: BackupLayout): Promise<boolean> {
  for (const marker of layoutMarkers(layout)) {
    if (!(await pathExists(path.join(root, marker)))) {
      return false;
    }
  }
  return true;
}

/** Classifies a backup root by which layout's marker directories it contains. */
export async function detectLayout(root: string, logger: Logger): Promise<BackupLayout> {
  const isV1 = await hasMarkers(root, 'v1');
  const isV2 = await hasMarkers(root, 'v2');

  if (isV1 && isV2) {
    logger.warn(`Backup at ${root} contains both layouts; using ${LAYOUT_CONFIGS.v2.name}`);
    return 'v2';
  }
  if (isV2) return 'v2';
  if (isV1) return 'v1';

  throw new FilterError(
    ErrorCode.UNRECOGNIZED_FORMAT,
    `Unrecognized backup format: ${root}`,
    `Expected ${layoutMarkers('v1').join(' + ')} or ${layoutMarkers('v2').join(' + ')} directories`,
    { root }
  );
}
