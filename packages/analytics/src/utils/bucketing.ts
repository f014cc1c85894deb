/**
 * Calendar bucketing
 * ==================
 * Down-samples daily observations to one representative date per ISO week,
 * month or year. The representative is always the latest date present in the
 * bucket, whatever order the dates arrive in.
 */

import type { IsoDate } from '@fxledger/core';
import type { Frequency } from '../types.js';
import { BUCKET_KEYS } from './frequency.js';

/**
 * Group items by their date, keeping first-seen order of dates and of items
 * within a date.
 */
export function groupByDate<T extends { date: IsoDate }>(items: Iterable<T>): Map<IsoDate, T[]> {
  const groups = new Map<IsoDate, T[]>();
  for (const item of items) {
    const group = groups.get(item.date);
    if (group) {
      group.push(item);
    } else {
      groups.set(item.date, [item]);
    }
  }
  return groups;
}

/**
 * Dates to emit for a frequency, ascending. Daily keeps every distinct date.
 */
export function selectBucketDates(dates: Iterable<IsoDate>, frequency: Frequency): IsoDate[] {
  const distinct = [...new Set(dates)];
  if (frequency === 'daily') {
    return distinct.sort();
  }

  const keyOf = BUCKET_KEYS[frequency];
  const latest = new Map<string, IsoDate>();
  for (const date of distinct) {
    const key = keyOf(date);
    const current = latest.get(key);
    if (current === undefined || date > current) {
      latest.set(key, date);
    }
  }
  return [...latest.values()].sort();
}
