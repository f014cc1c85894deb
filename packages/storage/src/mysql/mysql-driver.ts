import mysql from 'mysql2/promise';
import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import type { Logger } from '@fxledger/utils';
import { logger as storageLogger } from '../logger.js';
import type { SqlDriver, SqlExecutor, SqlResult, SqlValue } from '../sql/sql-driver.js';

export interface MysqlDriverConfig {
  connectionString: string;
  maxConnections?: number;
  connectTimeoutMillis?: number;
  logger?: Logger;
}

type QueryResultPacket = RowDataPacket[] | ResultSetHeader;

type RawQuery = (sql: string, values: SqlValue[]) => Promise<[QueryResultPacket, unknown]>;

async function runQuery(query: RawQuery, sql: string, params: readonly SqlValue[]): Promise<SqlResult> {
  const [result] = await query(sql, [...params]);
  if (Array.isArray(result)) {
    return { rows: result, rowCount: result.length };
  }
  return { rows: [], rowCount: result.affectedRows };
}

/**
 * mysql2-backed driver. DATE columns come back as strings (`dateStrings`).
 */
export class MysqlDriver implements SqlDriver {
  readonly dialect = 'mysql' as const;
  readonly supportsBulkValues = true;
  private readonly pool: Pool;
  private readonly logger: Logger;

  constructor(config: MysqlDriverConfig) {
    this.logger = config.logger ?? storageLogger;
    this.pool = mysql.createPool({
      uri: config.connectionString,
      connectionLimit: config.maxConnections ?? 10,
      connectTimeout: config.connectTimeoutMillis ?? 10_000,
      dateStrings: true,
    });
  }

  async query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    return runQuery((text, values) => this.pool.query<QueryResultPacket>(text, values), sql, params);
  }

  async transaction<T>(handler: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    const connection: PoolConnection = await this.pool.getConnection();
    const connectionQuery: RawQuery = (text, values) => connection.query<QueryResultPacket>(text, values);

    try {
      await connection.beginTransaction();
      const result = await handler({
        query: (sql, params = []) => runQuery(connectionQuery, sql, params),
      });
      await connection.commit();
      return result;
    } catch (error) {
      await connection.rollback().catch((rollbackError: unknown) => {
        this.logger.error('MySQL rollback failed', rollbackError);
      });
      throw error;
    } finally {
      connection.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
    this.logger.info('MySQL pool closed');
  }
}
