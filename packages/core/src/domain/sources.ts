/**
 * Rate sources
 *
 * RBI publishes a single reference rate per currency. SBI publishes card rates:
 * a reference rate plus buy/sell prices for telegraphic transfers, bills,
 * travel cards and currency notes.
 */

import { ValidationError } from '../errors.js';
import type { IsoDate } from '../time/dates.js';

export const SOURCE_TAGS = ['RBI', 'SBI'] as const;

export type SourceTag = (typeof SOURCE_TAGS)[number];

export type PayloadShape = 'plain' | 'tiered';

export interface SourceDescriptor {
  tag: SourceTag;
  payload: PayloadShape;
  /** Earliest date the upstream publisher has data for */
  minimumDate?: IsoDate;
}

export const SOURCE_DESCRIPTORS: Readonly<Record<SourceTag, SourceDescriptor>> = {
  RBI: { tag: 'RBI', payload: 'plain', minimumDate: '2022-04-12' },
  SBI: { tag: 'SBI', payload: 'tiered' },
};

export function isSourceTag(value: string): value is SourceTag {
  return SOURCE_TAGS.some((tag) => tag === value);
}

/**
 * Upper-case and validate a source tag
 */
export function normalizeSourceTag(value: string): SourceTag {
  const candidate = value.trim().toUpperCase();
  if (!isSourceTag(candidate)) {
    throw new ValidationError('UNSUPPORTED_SOURCE', `Unsupported source: ${value}`, {
      source: value,
      supported: [...SOURCE_TAGS],
    });
  }
  return candidate;
}

/**
 * Reject explicit dates earlier than the publisher's first available day
 */
export function assertSourceCoversDate(source: SourceTag, date: IsoDate): void {
  const minimum = SOURCE_DESCRIPTORS[source].minimumDate;
  if (minimum !== undefined && date < minimum) {
    const [year, month, day] = minimum.split('-');
    throw new ValidationError(
      'DATE_BEFORE_SOURCE_MINIMUM',
      `${source} does not provide data before ${day}/${month}/${year}`,
      { source, date, minimumDate: minimum }
    );
  }
}
