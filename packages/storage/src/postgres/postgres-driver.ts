import pg from 'pg';
import type { Pool, PoolClient } from 'pg';
import type { Logger } from '@fxledger/utils';
import { logger as storageLogger } from '../logger.js';
import type { SqlDriver, SqlExecutor, SqlResult, SqlRow, SqlValue } from '../sql/sql-driver.js';

export interface PostgresDriverConfig {
  connectionString: string;
  maxConnections?: number;
  connectionTimeoutMillis?: number;
  logger?: Logger;
}

async function runQuery(
  client: Pick<PoolClient, 'query'>,
  sql: string,
  params: readonly SqlValue[]
): Promise<SqlResult> {
  const result = await client.query<SqlRow>(sql, [...params]);
  return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
}

/**
 * pg-backed driver. One pooled client per query or transaction, always released.
 */
export class PostgresDriver implements SqlDriver {
  readonly dialect = 'postgres' as const;
  readonly supportsBulkValues = true;
  private readonly pool: Pool;
  private readonly logger: Logger;

  constructor(config: PostgresDriverConfig) {
    this.logger = config.logger ?? storageLogger;
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: 30_000,
      connectionTimeoutMillis: config.connectionTimeoutMillis ?? 10_000,
    });

    this.pool.on('error', (error: Error) => {
      this.logger.error('Postgres pool error', error);
    });
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    const client = await this.pool.connect();
    try {
      return await runQuery(client, sql, params);
    } finally {
      client.release();
    }
  }

  async transaction<T>(handler: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();

    try {
      await client.query('BEGIN');
      const result = await handler({
        query: (sql, params = []) => runQuery(client, sql, params),
      });
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK').catch((rollbackError: unknown) => {
        this.logger.error('Postgres rollback failed', rollbackError);
      });
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('Postgres pool closed');
  }
}
