import type { BackupLayout, LayoutConfig } from '../types/index.js';

export const LAYOUT_CONFIGS: Record<BackupLayout, LayoutConfig> = {
  v1: {
    name: 'LocoKit (per-file items)',
    itemDir: 'TimelineItem',
    sampleDir: 'LocomotionSample',
    placeDir: 'Place',
  },
  v2: {
    name: 'LocoKit2 (monthly items)',
    itemDir: 'items',
    sampleDir: 'samples',
    placeDir: 'places',
  },
};

/** Directories whose joint presence identifies a layout. */
export function layoutMarkers(layout: BackupLayout): string[] {
  const config = LAYOUT_CONFIGS[layout];
  return [config.itemDir, config.sampleDir];
}
