/**
 * @fxledger/storage
 *
 * BackendStrategy implementations for currency rates, LME prices and ingestion
 * checkpoints:
 * - SQLite (embedded, single file)
 * - PostgreSQL and MySQL (shared relational engine, per-dialect SQL)
 * - MongoDB (one collection per rate source)
 */

export { RelationalBackend } from './backends/relational-backend.js';
export type { RelationalBackendOptions, UpsertStrategy } from './backends/relational-backend.js';
export { SqliteBackend } from './backends/sqlite-backend.js';
export type { SqliteBackendOptions } from './backends/sqlite-backend.js';
export { MongoBackend } from './backends/mongo-backend.js';
export type { MongoBackendOptions } from './backends/mongo-backend.js';

export { DatabaseBackendKind, backendKindFromScheme, parseConnectionUrl } from './connection-info.js';
export type { DatabaseConnectionInfo } from './connection-info.js';
export {
  createBackend,
  defaultDriverRegistry,
  DRIVER_PACKAGES,
} from './backend-factory.js';
export type {
  CreateBackendOptions,
  DocumentDriverFactory,
  DriverFactoryOptions,
  DriverRegistry,
  SqlDriverFactory,
} from './backend-factory.js';
export { probeConnection } from './connection-probe.js';
export type { ConnectionProbeResult, ProbeOptions } from './connection-probe.js';

export {
  createMysqlDialect,
  createPostgresDialect,
  createSqlDialect,
  createSqliteDialect,
  sqliteCapabilitiesForVersion,
} from './sql/dialects.js';
export type { SqlDialect, SqlStatement, DropColumnStrategy } from './sql/dialects.js';
export type { SqlDriver, SqlExecutor, SqlResult, SqlRow, SqlValue, SqlDialectName } from './sql/sql-driver.js';
export { PostgresDriver } from './postgres/postgres-driver.js';
export { MysqlDriver } from './mysql/mysql-driver.js';
export { SqliteDriver, SQLITE_MEMORY } from './sqlite/sqlite-driver.js';
export { MongoDriver } from './mongo/mongo-driver.js';
export type {
  BulkReplaceResult,
  DocumentStoreDriver,
  ReplaceOperation,
} from './mongo/document-store-driver.js';
export { ALL_TABLES, CHECKPOINT_TABLE, COMMODITY_TABLES, RATE_TABLES } from './schema/tables.js';
export type { TableDefinition, ColumnDefinition } from './schema/tables.js';
