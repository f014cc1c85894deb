/**
 * @fxledger/analytics - Aggregation Engine
 * ========================================
 *
 * Calendar bucketing of rate and commodity observations into snapshots.
 */

// Types
export * from './types.js';

// Aggregators
export { SnapshotAggregator } from './aggregators/SnapshotAggregator.js';

// Utilities
export { parseFrequency, BUCKET_KEYS } from './utils/frequency.js';
export { groupByDate, selectBucketDates } from './utils/bucketing.js';
