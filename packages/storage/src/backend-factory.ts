/**
 * Backend factory
 * ===============
 * Maps each backend kind, once, to a driver factory and a BackendStrategy
 * implementation. A kind with no registered driver fails here, at
 * construction, rather than on first use.
 */

import { DriverNotConfiguredError } from '@fxledger/core';
import type { BackendStrategy } from '@fxledger/core';
import type { Logger } from '@fxledger/utils';
import { MongoBackend } from './backends/mongo-backend.js';
import { RelationalBackend } from './backends/relational-backend.js';
import { SqliteBackend } from './backends/sqlite-backend.js';
import { DatabaseBackendKind } from './connection-info.js';
import type { DatabaseConnectionInfo } from './connection-info.js';
import { MongoDriver } from './mongo/mongo-driver.js';
import type { DocumentStoreDriver } from './mongo/document-store-driver.js';
import { MysqlDriver } from './mysql/mysql-driver.js';
import { PostgresDriver } from './postgres/postgres-driver.js';
import type { SqlDriver } from './sql/sql-driver.js';
import { SqliteDriver } from './sqlite/sqlite-driver.js';

export interface DriverFactoryOptions {
  logger?: Logger;
  /** Upper bound for establishing a connection; used by connectivity probes */
  connectTimeoutMs?: number;
}

export type SqlDriverFactory = (info: DatabaseConnectionInfo, options: DriverFactoryOptions) => SqlDriver;
export type DocumentDriverFactory = (
  info: DatabaseConnectionInfo,
  options: DriverFactoryOptions
) => DocumentStoreDriver;

export interface DriverRegistry {
  [DatabaseBackendKind.SQLITE]?: SqlDriverFactory;
  [DatabaseBackendKind.POSTGRES]?: SqlDriverFactory;
  [DatabaseBackendKind.MYSQL]?: SqlDriverFactory;
  [DatabaseBackendKind.MONGODB]?: DocumentDriverFactory;
}

/** npm package that provides each kind's driver */
export const DRIVER_PACKAGES: Readonly<Record<DatabaseBackendKind, string>> = {
  [DatabaseBackendKind.SQLITE]: 'sqlite3',
  [DatabaseBackendKind.POSTGRES]: 'pg',
  [DatabaseBackendKind.MYSQL]: 'mysql2',
  [DatabaseBackendKind.MONGODB]: 'mongodb',
};

export const defaultDriverRegistry: DriverRegistry = {
  [DatabaseBackendKind.SQLITE]: (info, options) =>
    new SqliteDriver({ filename: info.name ?? ':memory:', logger: options.logger }),
  [DatabaseBackendKind.POSTGRES]: (info, options) =>
    new PostgresDriver({
      connectionString: info.url,
      connectionTimeoutMillis: options.connectTimeoutMs,
      logger: options.logger,
    }),
  [DatabaseBackendKind.MYSQL]: (info, options) =>
    new MysqlDriver({
      connectionString: info.url,
      connectTimeoutMillis: options.connectTimeoutMs,
      logger: options.logger,
    }),
  [DatabaseBackendKind.MONGODB]: (info, options) =>
    new MongoDriver({
      url: info.url,
      database: info.name ?? '',
      serverSelectionTimeoutMS: options.connectTimeoutMs,
    }),
};

export interface CreateBackendOptions {
  drivers?: DriverRegistry;
  logger?: Logger;
  /** SQLite only: assume this engine version instead of probing */
  sqliteEngineVersion?: string;
}

export function missingDriver(kind: DatabaseBackendKind): DriverNotConfiguredError {
  return new DriverNotConfiguredError(kind, `install the "${DRIVER_PACKAGES[kind]}" package`);
}

export function createBackend(info: DatabaseConnectionInfo, options: CreateBackendOptions = {}): BackendStrategy {
  const drivers = options.drivers ?? defaultDriverRegistry;
  const driverOptions: DriverFactoryOptions = { logger: options.logger };

  switch (info.backend) {
    case DatabaseBackendKind.SQLITE: {
      const factory = drivers[DatabaseBackendKind.SQLITE];
      if (!factory) {
        throw missingDriver(info.backend);
      }
      return new SqliteBackend(factory(info, driverOptions), {
        logger: options.logger,
        engineVersion: options.sqliteEngineVersion,
      });
    }
    case DatabaseBackendKind.POSTGRES:
    case DatabaseBackendKind.MYSQL: {
      const factory = drivers[info.backend];
      if (!factory) {
        throw missingDriver(info.backend);
      }
      return new RelationalBackend(factory(info, driverOptions), { logger: options.logger });
    }
    case DatabaseBackendKind.MONGODB: {
      const factory = drivers[DatabaseBackendKind.MONGODB];
      if (!factory) {
        throw missingDriver(info.backend);
      }
      return new MongoBackend(factory(info, driverOptions), { logger: options.logger });
    }
  }
}
