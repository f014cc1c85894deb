import { defaultSqlitePath } from '@fxledger/utils';
import { createSqliteDialect, sqliteCapabilitiesForVersion } from '../sql/dialects.js';
import type { SqlDriver } from '../sql/sql-driver.js';
import { SqliteDriver } from '../sqlite/sqlite-driver.js';
import { requireText } from './row-mapping.js';
import { RelationalBackend } from './relational-backend.js';
import type { RelationalBackendOptions } from './relational-backend.js';

export interface SqliteBackendOptions extends Omit<RelationalBackendOptions, 'dialect'> {
  /**
   * Treat the engine as this SQLite version instead of asking it.
   * Older versions lose ON CONFLICT (< 3.24) and DROP COLUMN (< 3.35).
   */
  engineVersion?: string;
}

/**
 * Embedded single-file engine. Capabilities follow the linked SQLite version,
 * probed once when the schema is prepared.
 */
export class SqliteBackend extends RelationalBackend {
  private readonly engineVersionOverride?: string;
  private engineVersion: string | null = null;

  constructor(driver: SqlDriver, options: SqliteBackendOptions = {}) {
    super(driver, { logger: options.logger, dialect: createSqliteDialect() });
    this.engineVersionOverride = options.engineVersion;
  }

  /**
   * Open (creating if needed) a database file; defaults to `data/fxledger.db`
   * under the working directory.
   */
  static open(filename: string = defaultSqlitePath(), options: SqliteBackendOptions = {}): SqliteBackend {
    return new SqliteBackend(new SqliteDriver({ filename, logger: options.logger }), options);
  }

  getEngineVersion(): string | null {
    return this.engineVersion;
  }

  protected async prepareDialect(): Promise<void> {
    const version = this.engineVersionOverride ?? (await this.detectVersion());
    const capabilities = sqliteCapabilitiesForVersion(version);
    this.engineVersion = version;
    this.dialect = createSqliteDialect(capabilities);
    this.logger.debug('SQLite engine detected', { version, ...capabilities });
  }

  private async detectVersion(): Promise<string> {
    const { rows } = await this.driver.query('SELECT sqlite_version() AS version');
    const [row] = rows;
    return row ? requireText(row, 'version') : '0';
  }
}
