/**
 * @fxledger/workflows
 *
 * The FxLedger facade and the backend migration workflow.
 */

export { FxLedger } from './FxLedger.js';
export type { FxLedgerOptions, QueryRange, SeedOptions, SeedResult } from './FxLedger.js';
export { migrateBackend, MigrateBackendSpecSchema } from './migrate/migrateBackend.js';
export type { MigrateBackendResult, MigrateBackendSpec } from './migrate/migrateBackend.js';
