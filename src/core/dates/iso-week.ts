import { SAMPLE_FILE_SUFFIX } from '../config/constants.js';
import type { DateRange } from '../types/index.js';
import { addDays } from './parser.js';

export interface IsoWeek {
  year: number;
  week: number;
}

const DIGITS = /^\d+$/;

/** Reads `YYYY-Wnn` (optionally followed by `.json.gz`). */
export function parseWeekFileName(fileName: string): IsoWeek | undefined {
  const stem = fileName.endsWith(SAMPLE_FILE_SUFFIX)
    ? fileName.slice(0, -SAMPLE_FILE_SUFFIX.length)
    : fileName;

  const parts = stem.split('-W');
  if (parts.length !== 2) return undefined;

  const [yearText, weekText] = parts;
  if (!DIGITS.test(yearText) || !DIGITS.test(weekText)) return undefined;

  const year = Number(yearText);
  if (year < 1 || year > 9999) return undefined;

  return { year, week: Number(weekText) };
}

/**
 * Monday 00:00 of the given ISO week through the following Monday 00:00.
 * Week 1 is the week holding January 4th.
 */
export function isoWeekSpan({ year, week }: IsoWeek): DateRange {
  const jan4 = new Date(0);
  jan4.setUTCFullYear(year, 0, 4);
  const weekday = (jan4.getUTCDay() + 6) % 7;

  const week1Monday = addDays(jan4.getTime(), -weekday);
  const start = addDays(week1Monday, (week - 1) * 7);

  return { start, end: addDays(start, 7) };
}
