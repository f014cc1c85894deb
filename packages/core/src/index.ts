/**
 * @fxledger/core
 *
 * Record model, storage contract, source ports, date and batching utilities and the error
 * taxonomy. This package has no dependencies on other @fxledger packages.
 */

export * from './errors.js';
export * from './time/dates.js';
export * from './collections.js';
export * from './domain/sources.js';
export * from './domain/metals.js';
export * from './domain/observations.js';
export * from './schemas/observations.js';
export * from './ports/index.js';
