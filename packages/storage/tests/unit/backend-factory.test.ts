/**
 * Tests for backend-factory.ts and connection-probe.ts
 */

import { describe, it, expect } from 'vitest';
import { DriverNotConfiguredError } from '@fxledger/core';
import { createBackend, missingDriver } from '../../src/backend-factory.js';
import type { DriverRegistry } from '../../src/backend-factory.js';
import { MongoBackend } from '../../src/backends/mongo-backend.js';
import { RelationalBackend } from '../../src/backends/relational-backend.js';
import { SqliteBackend } from '../../src/backends/sqlite-backend.js';
import { DatabaseBackendKind, parseConnectionUrl } from '../../src/connection-info.js';
import { probeConnection } from '../../src/connection-probe.js';
import { InMemoryDocumentStore } from '../helpers/in-memory-document-store.js';
import { RecordingSqlDriver } from '../helpers/recording-sql-driver.js';
import { silentLogger } from '../helpers/silent-logger.js';

const { logger } = silentLogger();

describe('createBackend', () => {
  it('should build a relational backend from the registered driver', () => {
    const drivers: DriverRegistry = {
      [DatabaseBackendKind.MYSQL]: () => new RecordingSqlDriver('mysql'),
    };

    const backend = createBackend(parseConnectionUrl('mysql://localhost/forex'), { drivers, logger });

    expect(backend).toBeInstanceOf(RelationalBackend);
    expect(backend.kind).toBe('mysql');
  });

  it('should build a document backend for mongodb URLs', () => {
    const drivers: DriverRegistry = { [DatabaseBackendKind.MONGODB]: () => new InMemoryDocumentStore() };

    const backend = createBackend(parseConnectionUrl('mongodb://localhost:27017/forex'), { drivers, logger });

    expect(backend).toBeInstanceOf(MongoBackend);
  });

  it('should open an in-memory SQLite backend by default', async () => {
    const backend = createBackend(parseConnectionUrl('sqlite://'), { logger });

    expect(backend).toBeInstanceOf(SqliteBackend);
    await backend.close();
  });

  it('should fail at construction when no driver is registered', () => {
    expect(() => createBackend(parseConnectionUrl('postgresql://localhost/forex'), { drivers: {} })).toThrow(
      DriverNotConfiguredError
    );
    expect(missingDriver(DatabaseBackendKind.POSTGRES).message).toBe(
      'Driver not configured for postgres backend (install the "pg" package)'
    );
  });
});

describe('probeConnection', () => {
  it('should report success for a reachable SQLite database', async () => {
    await expect(probeConnection(parseConnectionUrl('sqlite://'), { logger })).resolves.toEqual({
      success: true,
      message: 'Connection successful',
    });
  });

  it('should report driver errors without throwing', async () => {
    const driver = new RecordingSqlDriver('postgres', true, [
      () => {
        throw new Error('ECONNREFUSED');
      },
    ]);

    const result = await probeConnection(parseConnectionUrl('postgresql://localhost/forex'), {
      drivers: { [DatabaseBackendKind.POSTGRES]: () => driver },
      logger,
    });

    expect(result).toEqual({ success: false, message: 'Connection failed: ECONNREFUSED' });
    expect(driver.closed).toBe(true);
  });

  it('should report a missing driver', async () => {
    const result = await probeConnection(parseConnectionUrl('mysql://localhost/forex'), { drivers: {}, logger });

    expect(result).toEqual({
      success: false,
      message: 'Driver not configured for mysql backend (install the "mysql2" package)',
    });
  });

  it('should ping document stores', async () => {
    const store = new InMemoryDocumentStore();
    store.pingError = new Error('server selection timed out');

    const result = await probeConnection(parseConnectionUrl('mongodb://localhost:27017/forex'), {
      drivers: { [DatabaseBackendKind.MONGODB]: () => store },
      logger,
    });

    expect(result).toEqual({ success: false, message: 'Connection failed: server selection timed out' });
    expect(store.closed).toBe(true);
  });
});
