/**
 * SQL dialect strategies
 * ======================
 * One strategy object per dialect implements the same statement-building
 * interface. Backends never template dialect-specific SQL themselves.
 */

import type { ColumnDefinition, ColumnKind, TableDefinition } from '../schema/tables.js';
import { CHECKPOINT_TABLE } from '../schema/tables.js';
import type { SqlDialectName, SqlRow, SqlValue } from './sql-driver.js';

export interface SqlStatement {
  sql: string;
  params: SqlValue[];
}

export type DropColumnStrategy = 'drop-if-exists' | 'drop' | 'rebuild';

export interface SqlDialect {
  readonly name: SqlDialectName;
  /** INSERT ... ON CONFLICT / ON DUPLICATE KEY is available */
  readonly supportsConflictClause: boolean;
  readonly dropColumnStrategy: DropColumnStrategy;
  /** Upper bound on bind parameters per statement */
  readonly maxParameters: number;

  placeholder(index: number): string;
  columnType(kind: ColumnKind): string;
  /** Expression that reads a DATE column back as `YYYY-MM-DD` text */
  selectDate(column: string): string;

  createTable(table: TableDefinition, nameOverride?: string): string;
  addColumn(table: string, column: ColumnDefinition): string;
  dropColumn(table: string, column: string): string;
  introspectColumns(table: string): SqlStatement;
  columnNameFromRow(row: SqlRow): string | undefined;

  insert(table: string, columns: readonly string[], rows: readonly SqlValue[][]): SqlStatement;
  upsert(
    table: string,
    columns: readonly string[],
    keyColumns: readonly string[],
    rows: readonly SqlValue[][]
  ): SqlStatement;
  deleteByKey(table: string, keyColumns: readonly string[], key: readonly SqlValue[]): SqlStatement;
  /** Compare-and-swap checkpoint write: insert, or move forward only */
  advanceCheckpoint(source: string, date: string): SqlStatement;
}

export interface SqlDialectCapabilities {
  supportsConflictClause?: boolean;
  supportsDropColumn?: boolean;
}

interface DialectTraits {
  name: SqlDialectName;
  supportsConflictClause: boolean;
  dropColumnStrategy: DropColumnStrategy;
  maxParameters: number;
  placeholder(index: number): string;
  columnTypes: Record<ColumnKind, string>;
  selectDate(column: string): string;
  conflictClause(keyColumns: readonly string[], updateColumns: readonly string[]): string;
  checkpointUpsertTail: string;
  /** ADD COLUMN accepts expression defaults such as CURRENT_TIMESTAMP */
  expressionDefaultOnAdd: boolean;
  dropColumn(table: string, column: string): string;
  introspectColumns(table: string): SqlStatement;
}

/** Shared statement building; traits supply the dialect-specific fragments */
class TraitDialect implements SqlDialect {
  readonly name: SqlDialectName;
  readonly supportsConflictClause: boolean;
  readonly dropColumnStrategy: DropColumnStrategy;
  readonly maxParameters: number;

  constructor(private readonly traits: DialectTraits) {
    this.name = traits.name;
    this.supportsConflictClause = traits.supportsConflictClause;
    this.dropColumnStrategy = traits.dropColumnStrategy;
    this.maxParameters = traits.maxParameters;
  }

  placeholder(index: number): string {
    return this.traits.placeholder(index);
  }

  columnType(kind: ColumnKind): string {
    return this.traits.columnTypes[kind];
  }

  selectDate(column: string): string {
    return this.traits.selectDate(column);
  }

  createTable(table: TableDefinition, nameOverride?: string): string {
    const columns = table.columns.map((column) => `  ${this.columnDefinition(column)}`);
    columns.push(`  PRIMARY KEY (${table.primaryKey.join(', ')})`);
    return `CREATE TABLE IF NOT EXISTS ${nameOverride ?? table.name} (\n${columns.join(',\n')}\n)`;
  }

  addColumn(table: string, column: ColumnDefinition): string {
    // Patched columns are always nullable so existing rows stay valid
    const constantDefault = column.defaultValue?.startsWith("'") ?? false;
    const defaultClause =
      column.defaultValue && (constantDefault || this.traits.expressionDefaultOnAdd)
        ? ` DEFAULT ${column.defaultValue}`
        : '';
    return `ALTER TABLE ${table} ADD COLUMN ${column.name} ${this.columnType(column.kind)}${defaultClause}`;
  }

  dropColumn(table: string, column: string): string {
    return this.traits.dropColumn(table, column);
  }

  introspectColumns(table: string): SqlStatement {
    return this.traits.introspectColumns(table);
  }

  columnNameFromRow(row: SqlRow): string | undefined {
    const value = row.column_name ?? row.COLUMN_NAME ?? row.name;
    return typeof value === 'string' ? value : undefined;
  }

  insert(table: string, columns: readonly string[], rows: readonly SqlValue[][]): SqlStatement {
    const { valuesSql, params } = this.values(rows);
    return {
      sql: `INSERT INTO ${table} (${columns.join(', ')}) VALUES ${valuesSql}`,
      params,
    };
  }

  upsert(
    table: string,
    columns: readonly string[],
    keyColumns: readonly string[],
    rows: readonly SqlValue[][]
  ): SqlStatement {
    const statement = this.insert(table, columns, rows);
    const updateColumns = columns.filter((column) => !keyColumns.includes(column));
    return {
      sql: `${statement.sql} ${this.traits.conflictClause(keyColumns, updateColumns)}`,
      params: statement.params,
    };
  }

  deleteByKey(table: string, keyColumns: readonly string[], key: readonly SqlValue[]): SqlStatement {
    const predicate = keyColumns
      .map((column, index) => `${column} = ${this.placeholder(index + 1)}`)
      .join(' AND ');
    return { sql: `DELETE FROM ${table} WHERE ${predicate}`, params: [...key] };
  }

  advanceCheckpoint(source: string, date: string): SqlStatement {
    return {
      sql:
        `INSERT INTO ${CHECKPOINT_TABLE.name} (source, last_ingested_date) ` +
        `VALUES (${this.placeholder(1)}, ${this.placeholder(2)}) ${this.traits.checkpointUpsertTail}`,
      params: [source, date],
    };
  }

  private columnDefinition(column: ColumnDefinition): string {
    const nullability = column.nullable ? '' : ' NOT NULL';
    const defaultClause = column.defaultValue ? ` DEFAULT ${column.defaultValue}` : '';
    return `${column.name} ${this.columnType(column.kind)}${nullability}${defaultClause}`;
  }

  private values(rows: readonly SqlValue[][]): { valuesSql: string; params: SqlValue[] } {
    const params: SqlValue[] = [];
    const tuples = rows.map((row) => {
      const slots = row.map((value) => {
        params.push(value);
        return this.placeholder(params.length);
      });
      return `(${slots.join(', ')})`;
    });
    return { valuesSql: tuples.join(', '), params };
  }
}

const standardColumnTypes: Record<ColumnKind, string> = {
  date: 'DATE',
  currency: 'VARCHAR(3)',
  decimal: 'NUMERIC(18, 6)',
  source: 'VARCHAR(32)',
  timestamp: 'TIMESTAMP',
};

function excludedConflictClause(keyColumns: readonly string[], updateColumns: readonly string[]): string {
  const assignments = updateColumns.map((column) => `${column} = EXCLUDED.${column}`).join(', ');
  return `ON CONFLICT (${keyColumns.join(', ')}) DO UPDATE SET ${assignments}`;
}

const EXCLUDED_CHECKPOINT_TAIL =
  'ON CONFLICT (source) DO UPDATE SET ' +
  'last_ingested_date = EXCLUDED.last_ingested_date, updated_at = CURRENT_TIMESTAMP ' +
  `WHERE EXCLUDED.last_ingested_date > ${CHECKPOINT_TABLE.name}.last_ingested_date`;

export function createPostgresDialect(): SqlDialect {
  return new TraitDialect({
    name: 'postgres',
    supportsConflictClause: true,
    dropColumnStrategy: 'drop-if-exists',
    maxParameters: 65535,
    placeholder: (index) => `$${index}`,
    columnTypes: standardColumnTypes,
    selectDate: (column) => `to_char(${column}, 'YYYY-MM-DD')`,
    conflictClause: excludedConflictClause,
    checkpointUpsertTail: EXCLUDED_CHECKPOINT_TAIL,
    expressionDefaultOnAdd: true,
    dropColumn: (table, column) => `ALTER TABLE ${table} DROP COLUMN IF EXISTS ${column}`,
    introspectColumns: (table) => ({
      sql:
        'SELECT column_name FROM information_schema.columns ' +
        'WHERE table_schema = current_schema() AND table_name = $1',
      params: [table],
    }),
  });
}

export function createMysqlDialect(): SqlDialect {
  return new TraitDialect({
    name: 'mysql',
    supportsConflictClause: true,
    dropColumnStrategy: 'drop',
    maxParameters: 65535,
    placeholder: () => '?',
    columnTypes: standardColumnTypes,
    selectDate: (column) => `DATE_FORMAT(${column}, '%Y-%m-%d')`,
    conflictClause: (_keyColumns, updateColumns) =>
      `ON DUPLICATE KEY UPDATE ${updateColumns.map((column) => `${column} = VALUES(${column})`).join(', ')}`,
    // updated_at is assigned first so it still sees the stored date
    checkpointUpsertTail:
      'ON DUPLICATE KEY UPDATE ' +
      'updated_at = IF(VALUES(last_ingested_date) > last_ingested_date, CURRENT_TIMESTAMP, updated_at), ' +
      'last_ingested_date = GREATEST(last_ingested_date, VALUES(last_ingested_date))',
    expressionDefaultOnAdd: true,
    dropColumn: (table, column) => `ALTER TABLE ${table} DROP COLUMN ${column}`,
    introspectColumns: (table) => ({
      sql:
        'SELECT column_name AS column_name FROM information_schema.columns ' +
        'WHERE table_schema = DATABASE() AND table_name = ?',
      params: [table],
    }),
  });
}

export function createSqliteDialect(capabilities: SqlDialectCapabilities = {}): SqlDialect {
  return new TraitDialect({
    name: 'sqlite',
    supportsConflictClause: capabilities.supportsConflictClause ?? true,
    dropColumnStrategy: capabilities.supportsDropColumn === false ? 'rebuild' : 'drop',
    maxParameters: 999,
    placeholder: () => '?',
    columnTypes: standardColumnTypes,
    selectDate: (column) => column,
    conflictClause: excludedConflictClause,
    checkpointUpsertTail: EXCLUDED_CHECKPOINT_TAIL,
    expressionDefaultOnAdd: false,
    dropColumn: (table, column) => `ALTER TABLE ${table} DROP COLUMN ${column}`,
    introspectColumns: (table) => ({ sql: `PRAGMA table_info(${table})`, params: [] }),
  });
}

/**
 * Compare dotted version strings, e.g. `3.24.0` against `3.35`
 */
export function compareVersions(a: string, b: string): number {
  const left = a.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const right = b.split('.').map((part) => Number.parseInt(part, 10) || 0);
  const length = Math.max(left.length, right.length);
  for (let index = 0; index < length; index += 1) {
    const diff = (left[index] ?? 0) - (right[index] ?? 0);
    if (diff !== 0) {
      return diff;
    }
  }
  return 0;
}

/** ON CONFLICT arrived in SQLite 3.24, ALTER TABLE DROP COLUMN in 3.35 */
export function sqliteCapabilitiesForVersion(version: string): Required<SqlDialectCapabilities> {
  return {
    supportsConflictClause: compareVersions(version, '3.24.0') >= 0,
    supportsDropColumn: compareVersions(version, '3.35.0') >= 0,
  };
}

const dialectFactories: Record<SqlDialectName, () => SqlDialect> = {
  postgres: createPostgresDialect,
  mysql: createMysqlDialect,
  sqlite: () => createSqliteDialect(),
};

export function createSqlDialect(name: SqlDialectName): SqlDialect {
  return dialectFactories[name]();
}
