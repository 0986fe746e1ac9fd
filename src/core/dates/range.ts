import { DAY_END_TIME, DAY_START_TIME } from '../config/constants.js';
import { ErrorCode, FilterError } from '../errors.js';
import type { DateRange, NaiveInstant } from '../types/index.js';
import { formatNaiveInstant, parseNaiveInstant } from './parser.js';

/** Range bounds as the user wrote them, before parsing. */
export interface RangeSpec {
  start: string;
  end: string;
}

export function parseDateRange(bounds: RangeSpec): DateRange {
  const start = parseNaiveInstant(bounds.start);
  const end = parseNaiveInstant(bounds.end);

  if (start === undefined || end === undefined) {
    throw new FilterError(
      ErrorCode.INVALID_RANGE,
      `Invalid date format: "${bounds.start}" to "${bounds.end}"`,
      'Use: YYYY-MM-DD HH:MM:SS',
      { start: bounds.start, end: bounds.end }
    );
  }

  if (start > end) {
    throw new FilterError(
      ErrorCode.INVALID_RANGE,
      'Start date cannot be after end date',
      undefined,
      { start: bounds.start, end: bounds.end }
    );
  }

  return { start, end };
}

/** Whole calendar day, `00:00:00` through `23:59:59`. */
export function rangeForDay(day: string): RangeSpec {
  return {
    start: `${day} ${DAY_START_TIME}`,
    end: `${day} ${DAY_END_TIME}`,
  };
}

function localDay(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/** From the start of the local day `days` days before `now` through the end of today. */
export function rangeForDaysBack(days: number, now: Date = new Date()): RangeSpec {
  const startDate = new Date(now.getTime());
  startDate.setDate(startDate.getDate() - days);

  return {
    start: `${localDay(startDate)} ${DAY_START_TIME}`,
    end: `${localDay(now)} ${DAY_END_TIME}`,
  };
}

/** Inclusive span intersection. */
export function overlapsRange(start: NaiveInstant, end: NaiveInstant, range: DateRange): boolean {
  return start <= range.end && end >= range.start;
}

/** Inclusive instant containment. */
export function containsInstant(range: DateRange, instant: NaiveInstant): boolean {
  return range.start <= instant && instant <= range.end;
}

export function formatRange(range: DateRange): string {
  return `${formatNaiveInstant(range.start)} to ${formatNaiveInstant(range.end)}`;
}
