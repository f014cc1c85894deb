/**
 * SQL driver seam
 *
 * Relational backends talk to pg, mysql2 and sqlite3 through this interface so
 * the upsert ladder and schema patching are written once.
 */

export type SqlValue = string | number | null;

export type SqlRow = Record<string, unknown>;

export interface SqlResult {
  rows: SqlRow[];
  /** Rows affected for writes, rows returned for reads */
  rowCount: number;
}

export interface SqlExecutor {
  query(sql: string, params?: readonly SqlValue[]): Promise<SqlResult>;
}

export type SqlDialectName = 'postgres' | 'mysql' | 'sqlite';

export interface SqlDriver extends SqlExecutor {
  readonly dialect: SqlDialectName;
  /** Driver accepts multi-row VALUES statements */
  readonly supportsBulkValues: boolean;
  /**
   * Run `handler` inside BEGIN/COMMIT on one connection. Any rejection rolls back
   * and is rethrown; the connection is released on every path.
   */
  transaction<T>(handler: (executor: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function isSqlRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toSqlRows(values: readonly unknown[]): SqlRow[] {
  return values.filter(isSqlRow);
}
