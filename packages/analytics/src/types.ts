/**
 * Analytics Types
 * ===============
 */

import type { SourceTag } from '@fxledger/core';

export const FREQUENCIES = ['daily', 'weekly', 'monthly', 'yearly'] as const;

/** Calendar granularity for history queries */
export type Frequency = (typeof FREQUENCIES)[number];

/** Frequencies that collapse several days into one bucket */
export type BucketFrequency = Exclude<Frequency, 'daily'>;

export interface SnapshotAggregatorOptions {
  /**
   * Display order for multi-source results. Sources missing from the list follow
   * the listed ones in their default order.
   */
  sourcePriority?: readonly SourceTag[];
}
