export type BackupLayout = 'v1' | 'v2';

/** Epoch milliseconds of a wall-clock time read as UTC; timezone suffixes are discarded. */
export type NaiveInstant = number;

export interface DateRange {
  start: NaiveInstant;
  end: NaiveInstant;
}

export interface LayoutConfig {
  name: string;
  itemDir: string;
  sampleDir: string;
  placeDir: string;
}

export interface TimelineItemBase {
  id?: string;
  startDate?: string | null;
  endDate?: string | null;
  isVisit?: boolean;
  placeId?: string | null;
}

/*
 * Record shapes below are read-only views over parsed JSON. Only the fields
 * filtering looks at are modelled; files are always written from the raw value.
 */

/** One file per item under TimelineItem/<bucket>/. */
export type V1TimelineItem = TimelineItemBase;

/** Entry of an items/YYYY-MM.json array. */
export interface V2TimelineItem extends TimelineItemBase {
  base?: TimelineItemBase;
  visit?: { placeId?: string | null };
  place?: { id?: string | null };
}

export interface LocomotionSample {
  date?: string | null;
}

export interface PlaceRecord {
  id?: string | null;
}

export type SkipLevel = 'debug' | 'warn';

export interface SkipRecord {
  file: string;
  reason: string;
  level: SkipLevel;
}

/** Result of handling one source file. */
export type FileOutcome =
  | { status: 'written'; file: string; count: number }
  | { status: 'excluded'; file: string }
  | { status: 'skipped'; file: string; reason: string; level: SkipLevel };
