import { isoWeekKey, monthKey, ValidationError, yearKey } from '@fxledger/core';
import type { IsoDate } from '@fxledger/core';
import { FREQUENCIES } from '../types.js';
import type { BucketFrequency, Frequency } from '../types.js';

function isFrequency(value: string): value is Frequency {
  return FREQUENCIES.some((frequency) => frequency === value);
}

/**
 * Parse a frequency token (case-insensitive). Unknown tokens are rejected, never
 * defaulted.
 */
export function parseFrequency(value: string): Frequency {
  const normalized = value.trim().toLowerCase();
  if (!isFrequency(normalized)) {
    throw new ValidationError(
      'UNKNOWN_FREQUENCY',
      `Unknown frequency: ${value} (expected one of ${FREQUENCIES.join(', ')})`,
      { frequency: value }
    );
  }
  return normalized;
}

export const BUCKET_KEYS: Readonly<Record<BucketFrequency, (date: IsoDate) => string>> = {
  weekly: isoWeekKey,
  monthly: monthKey,
  yearly: yearKey,
};
