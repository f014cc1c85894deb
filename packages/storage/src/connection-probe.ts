import { toError } from '@fxledger/core';
import type { Logger } from '@fxledger/utils';
import { DatabaseBackendKind } from './connection-info.js';
import type { DatabaseConnectionInfo } from './connection-info.js';
import { defaultDriverRegistry, missingDriver } from './backend-factory.js';
import type { DriverRegistry } from './backend-factory.js';
import { logger as storageLogger } from './logger.js';

export interface ConnectionProbeResult {
  success: boolean;
  message: string;
}

export interface ProbeOptions {
  drivers?: DriverRegistry;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Check that a backend is reachable. Never throws: every failure, including a
 * missing driver, comes back as `{ success: false, message }`.
 */
export async function probeConnection(
  info: DatabaseConnectionInfo,
  options: ProbeOptions = {}
): Promise<ConnectionProbeResult> {
  const drivers = options.drivers ?? defaultDriverRegistry;
  const log = options.logger ?? storageLogger;
  const factoryOptions = { logger: log, connectTimeoutMs: options.timeoutMs ?? 5_000 };

  try {
    if (info.backend === DatabaseBackendKind.MONGODB) {
      const factory = drivers[DatabaseBackendKind.MONGODB];
      if (!factory) {
        return { success: false, message: missingDriver(info.backend).message };
      }
      const driver = factory(info, factoryOptions);
      try {
        await driver.ping();
      } finally {
        await driver.close();
      }
    } else {
      const factory = drivers[info.backend];
      if (!factory) {
        return { success: false, message: missingDriver(info.backend).message };
      }
      const driver = factory(info, factoryOptions);
      try {
        await driver.query('SELECT 1');
      } finally {
        await driver.close();
      }
    }
  } catch (error) {
    const failure = toError(error);
    log.warn('Connection probe failed', { backend: info.backend, error: failure.message });
    return { success: false, message: `Connection failed: ${failure.message}` };
  }

  return { success: true, message: 'Connection successful' };
}
