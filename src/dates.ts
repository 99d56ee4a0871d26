import { DateTime } from 'luxon';

export const DATE_FORMAT = 'dd.MM.yyyy';

const DATE_PATTERN = /^(\d{2})\.(\d{2})\.(\d{4})$/;

// All calendar days are UTC midnights so that day differences are whole numbers.
export function calendarDay(year: number, month: number, day: number): DateTime {
  return DateTime.utc(year, month, day);
}

export function currentDay(now: DateTime = DateTime.local()): DateTime {
  return calendarDay(now.year, now.month, now.day);
}

/**
 * Strict DD.MM.YYYY parse. Returns null for anything that is not a real
 * calendar date (31.02.2000, 1.1.2000, 01-01-2000, year 0000).
 */
export function parseDate(raw: string): DateTime | null {
  const m = raw.match(DATE_PATTERN);
  if (!m) return null;
  const year = parseInt(m[3], 10);
  if (year < 1) return null;
  const parsed = DateTime.fromFormat(raw, DATE_FORMAT, { zone: 'utc' });
  return parsed.isValid ? parsed.startOf('day') : null;
}

export function formatDate(date: DateTime): string {
  return date.toFormat(DATE_FORMAT);
}

// Feb 29 falls back to Feb 28 in non-leap years.
export function anniversaryIn(year: number, date: DateTime): DateTime {
  const daysInMonth = calendarDay(year, date.month, 1).daysInMonth ?? date.day;
  return calendarDay(year, date.month, Math.min(date.day, daysInMonth));
}

export function nextAnniversary(date: DateTime, from: DateTime): DateTime {
  const candidate = anniversaryIn(from.year, date);
  if (candidate < from) return anniversaryIn(from.year + 1, date);
  return candidate;
}

export function daysBetween(from: DateTime, to: DateTime): number {
  return Math.round(to.diff(from, 'days').days);
}
