import type { NaiveInstant } from '../types/index.js';

const ISO_LOCAL_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2})(?::(\d{2})(?::(\d{2})(?:[.,](\d+))?)?)?)?$/;

const MS_PER_DAY = 86_400_000;

/**
 * Drops any timezone designator without applying it.
 *
 * A trailing negative offset cannot be told apart from the date's own dashes
 * by a single character, so it is recognised by there being more than two
 * dashes in the string.
 */
export function stripTimezone(value: string): string {
  const normalized = value.replace(/ /g, 'T');

  if (normalized.includes('Z')) {
    return normalized.replace(/Z/g, '');
  }
  if (normalized.includes('+')) {
    return normalized.split('+')[0];
  }

  const parts = normalized.split('-');
  if (parts.length > 3) {
    return parts.slice(0, 3).join('-');
  }
  return normalized;
}

function daysInMonth(year: number, month: number): number {
  const lastDay = new Date(0);
  lastDay.setUTCFullYear(year, month, 0);
  return lastDay.getUTCDate();
}

/**
 * Parses `YYYY-MM-DD[( |T)HH[:MM[:SS[.ffffff]]]]` with an optional `Z`,
 * `+hh:mm` or `-hh:mm` suffix into a naive instant.
 *
 * The offset is discarded, so every timestamp compares by its wall-clock
 * fields. Returns `undefined` for anything it cannot read.
 */
export function parseNaiveInstant(value?: string | null): NaiveInstant | undefined {
  if (typeof value !== 'string' || value.length === 0) {
    return undefined;
  }

  const match = ISO_LOCAL_PATTERN.exec(stripTimezone(value));
  if (!match) {
    return undefined;
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText] = match;
  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = hourText ? Number(hourText) : 0;
  const minute = minuteText ? Number(minuteText) : 0;
  const second = secondText ? Number(secondText) : 0;
  const micros = fractionText ? Number(fractionText.slice(0, 6).padEnd(6, '0')) : 0;

  if (year < 1 || month < 1 || month > 12) return undefined;
  if (day < 1 || day > daysInMonth(year, month)) return undefined;
  if (hour > 23 || minute > 59 || second > 59) return undefined;

  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  date.setUTCHours(hour, minute, second, 0);

  return date.getTime() + micros / 1000;
}

/** Renders an instant as `YYYY-MM-DD HH:MM:SS`. */
export function formatNaiveInstant(instant: NaiveInstant): string {
  return new Date(Math.floor(instant)).toISOString().slice(0, 19).replace('T', ' ');
}

export function addDays(instant: NaiveInstant, days: number): NaiveInstant {
  return instant + days * MS_PER_DAY;
}
