/**
 * In-process SqlDriver that records every statement and answers from a
 * caller-supplied responder. Stands in for pg/mysql2 in dialect tests.
 */

import type { SqlDialectName, SqlDriver, SqlExecutor, SqlResult, SqlValue } from '../../src/sql/sql-driver.js';
import { ALL_TABLES } from '../../src/schema/tables.js';

export interface RecordedStatement {
  sql: string;
  params: SqlValue[];
  inTransaction: boolean;
}

export type Responder = (sql: string, params: SqlValue[]) => SqlResult | undefined;

/** Answers column introspection with the full expected column set */
export function introspectAsCurrent(sql: string, params: SqlValue[]): SqlResult | undefined {
  if (!sql.includes('information_schema.columns')) {
    return undefined;
  }
  const table = ALL_TABLES.find((candidate) => candidate.name === params[0]);
  const rows = (table?.columns ?? []).map((column) => ({ column_name: column.name }));
  return { rows, rowCount: rows.length };
}

export class RecordingSqlDriver implements SqlDriver {
  readonly statements: RecordedStatement[] = [];
  readonly transactions = { begun: 0, committed: 0, rolledBack: 0 };
  closed = false;

  constructor(
    readonly dialect: SqlDialectName = 'postgres',
    readonly supportsBulkValues: boolean = true,
    private readonly responders: Responder[] = [introspectAsCurrent]
  ) {}

  async query(sql: string, params: readonly SqlValue[] = []): Promise<SqlResult> {
    return this.run(sql, params, false);
  }

  async transaction<T>(handler: (executor: SqlExecutor) => Promise<T>): Promise<T> {
    this.transactions.begun += 1;
    try {
      const result = await handler({ query: (sql, params = []) => this.run(sql, params, true) });
      this.transactions.committed += 1;
      return result;
    } catch (error) {
      this.transactions.rolledBack += 1;
      throw error;
    }
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  sqlMatching(fragment: string): string[] {
    return this.statements.filter((statement) => statement.sql.includes(fragment)).map((s) => s.sql);
  }

  private async run(sql: string, params: readonly SqlValue[], inTransaction: boolean): Promise<SqlResult> {
    const copy = [...params];
    this.statements.push({ sql, params: copy, inTransaction });
    for (const responder of this.responders) {
      const result = responder(sql, copy);
      if (result) {
        return result;
      }
    }
    return { rows: [], rowCount: 0 };
  }
}
