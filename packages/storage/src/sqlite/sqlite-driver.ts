import sqlite3 from 'sqlite3';
import type { Database, RunResult } from 'sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import type { Logger } from '@fxledger/utils';
import { logger as storageLogger } from '../logger.js';
import { toSqlRows } from '../sql/sql-driver.js';
import type { SqlDriver, SqlExecutor, SqlResult, SqlValue } from '../sql/sql-driver.js';

export const SQLITE_MEMORY = ':memory:';

export interface SqliteDriverConfig {
  /** File path, or `:memory:` */
  filename: string;
  logger?: Logger;
}

const READ_STATEMENT = /^\s*(SELECT|PRAGMA|WITH)\b/i;

/**
 * sqlite3-backed driver over a single connection held for the driver's lifetime.
 *
 * Statements are serialised through a promise chain so a transaction owns the
 * connection from BEGIN to COMMIT.
 */
export class SqliteDriver implements SqlDriver {
  readonly dialect = 'sqlite' as const;
  readonly supportsBulkValues = true;
  readonly filename: string;
  private readonly db: Database;
  private readonly opened: Promise<void>;
  private readonly logger: Logger;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(config: SqliteDriverConfig) {
    this.filename = config.filename;
    this.logger = config.logger ?? storageLogger;

    if (config.filename !== SQLITE_MEMORY) {
      fs.mkdirSync(path.dirname(path.resolve(config.filename)), { recursive: true });
    }

    let resolveOpen: () => void = () => undefined;
    let rejectOpen: (error: Error) => void = () => undefined;
    this.opened = new Promise<void>((resolve, reject) => {
      resolveOpen = resolve;
      rejectOpen = reject;
    });
    this.db = new sqlite3.Database(config.filename, (error: Error | null) => {
      if (error) {
        rejectOpen(error);
      } else {
        resolveOpen();
      }
    });
    // Surfaced on first use instead
    this.opened.catch(() => undefined);
  }

  query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    return this.exclusive(() => this.execute(sql, params));
  }

  transaction<T>(handler: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    return this.exclusive(async () => {
      await this.execute('BEGIN');
      try {
        const result = await handler({
          query: (sql, params = []) => this.execute(sql, params),
        });
        await this.execute('COMMIT');
        return result;
      } catch (error) {
        await this.execute('ROLLBACK').catch((rollbackError: unknown) => {
          this.logger.error('SQLite rollback failed', rollbackError);
        });
        throw error;
      }
    });
  }

  async close(): Promise<void> {
    await this.queue.catch(() => undefined);
    await this.opened;
    await new Promise<void>((resolve, reject) => {
      this.db.close((error: Error | null) => (error ? reject(error) : resolve()));
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async execute(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    await this.opened;
    const values = [...params];

    if (READ_STATEMENT.test(sql)) {
      return new Promise<SqlResult>((resolve, reject) => {
        this.db.all(sql, values, (error: Error | null, rows: unknown[]) => {
          if (error) {
            reject(error);
            return;
          }
          const parsed = toSqlRows(rows);
          resolve({ rows: parsed, rowCount: parsed.length });
        });
      });
    }

    return new Promise<SqlResult>((resolve, reject) => {
      this.db.run(sql, values, function (this: RunResult, error: Error | null) {
        if (error) {
          reject(error);
          return;
        }
        resolve({ rows: [], rowCount: this.changes });
      });
    });
  }
}
