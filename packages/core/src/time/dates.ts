/**
 * Calendar date utilities
 *
 * Observation dates are carried as ISO-8601 calendar strings (`YYYY-MM-DD`). They sort
 * lexicographically in date order, which storage backends and bucketing rely on.
 */

import { DateTime } from 'luxon';
import { ValidationError } from '../errors.js';

/** ISO-8601 calendar date, e.g. `2024-01-31` */
export type IsoDate = string;

/** Inclusive date window; either side may be open */
export interface DateRange {
  start?: IsoDate;
  end?: IsoDate;
}

/** Inclusive, closed date window */
export interface DateWindow {
  start: IsoDate;
  end: IsoDate;
}

const ISO_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

function toDateTime(value: IsoDate): DateTime {
  if (!ISO_DATE_PATTERN.test(value)) {
    throw new ValidationError('INVALID_DATE', `Invalid date: ${value} (expected YYYY-MM-DD)`, { value });
  }
  const parsed = DateTime.fromISO(value, { zone: 'utc' });
  if (!parsed.isValid) {
    throw new ValidationError('INVALID_DATE', `Invalid date: ${value}`, {
      value,
      reason: parsed.invalidReason,
    });
  }
  return parsed;
}

function fromDateTime(value: DateTime): IsoDate {
  return value.toFormat('yyyy-MM-dd');
}

/**
 * Validate and normalise a calendar date.
 *
 * Accepts `YYYY-MM-DD` strings and JS `Date` objects (UTC calendar day).
 */
export function parseIsoDate(value: IsoDate | Date): IsoDate {
  if (value instanceof Date) {
    const parsed = DateTime.fromJSDate(value, { zone: 'utc' });
    if (!parsed.isValid) {
      throw new ValidationError('INVALID_DATE', 'Invalid Date object');
    }
    return fromDateTime(parsed);
  }
  return fromDateTime(toDateTime(value.trim()));
}

export function isIsoDate(value: string): boolean {
  return ISO_DATE_PATTERN.test(value) && DateTime.fromISO(value, { zone: 'utc' }).isValid;
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return fromDateTime(toDateTime(date).plus({ days }));
}

export function maxIsoDate(a: IsoDate, b: IsoDate): IsoDate {
  return a >= b ? a : b;
}

export function todayIsoDate(nowMs: number = Date.now()): IsoDate {
  return fromDateTime(DateTime.fromMillis(nowMs, { zone: 'utc' }));
}

/**
 * Reject inverted ranges. Open sides are allowed.
 */
export function assertDateRange(range: DateRange): void {
  if (range.start !== undefined && range.end !== undefined && range.start > range.end) {
    throw new ValidationError(
      'INVERTED_DATE_RANGE',
      `Start date ${range.start} must be on or before end date ${range.end}`,
      { start: range.start, end: range.end }
    );
  }
}

export function isWithinRange(date: IsoDate, range: DateRange): boolean {
  if (range.start !== undefined && date < range.start) {
    return false;
  }
  if (range.end !== undefined && date > range.end) {
    return false;
  }
  return true;
}

/**
 * Split an inclusive window into calendar-month chunks.
 *
 * The first and last chunk are clipped to the window:
 * `monthRanges('2023-01-15', '2023-03-02')` yields
 * `[01-15..01-31], [02-01..02-28], [03-01..03-02]`.
 */
export function monthRanges(start: IsoDate, end: IsoDate): DateWindow[] {
  assertDateRange({ start, end });
  const last = toDateTime(end);
  const chunks: DateWindow[] = [];
  let cursor = toDateTime(start);

  while (cursor <= last) {
    const monthEnd = cursor.endOf('month').startOf('day');
    const chunkEnd = monthEnd < last ? monthEnd : last;
    chunks.push({ start: fromDateTime(cursor), end: fromDateTime(chunkEnd) });
    cursor = monthEnd.plus({ days: 1 });
  }

  return chunks;
}

/** ISO week-numbering year and week, e.g. `2024-W01` */
export function isoWeekKey(date: IsoDate): string {
  const value = toDateTime(date);
  return `${value.weekYear}-W${String(value.weekNumber).padStart(2, '0')}`;
}

export function monthKey(date: IsoDate): string {
  return date.slice(0, 7);
}

export function yearKey(date: IsoDate): string {
  return date.slice(0, 4);
}
