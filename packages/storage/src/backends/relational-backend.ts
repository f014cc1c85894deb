/**
 * Relational backend
 * ==================
 * BackendStrategy over any SQL dialect. Writes go through an upsert ladder,
 * best first:
 *
 * 1. bulk-upsert   - one multi-row INSERT ... ON CONFLICT/ON DUPLICATE KEY per chunk
 * 2. row-upsert    - the same statement per row
 * 3. delete-insert - DELETE then INSERT per row, for engines without conflict clauses
 *
 * Every attempt runs in its own transaction covering the whole batch, so a failed
 * rung leaves nothing behind before the next one is tried.
 */

import {
  addPersistenceResults,
  assertDateRange,
  chunk,
  ConfigurationError,
  DatabaseError,
  emptyPersistenceResult,
  parseIsoDate,
  SchemaError,
  SOURCE_DESCRIPTORS,
  SOURCE_TAGS,
  toError,
  ValidationError,
} from '@fxledger/core';
import type {
  BackendStrategy,
  CommodityObservation,
  DateRange,
  IngestionCheckpoint,
  IsoDate,
  MetalTag,
  PersistenceResult,
  RateObservation,
  RateRangeQuery,
  SourceTag,
} from '@fxledger/core';
import { LogHelpers } from '@fxledger/utils';
import type { Logger } from '@fxledger/utils';
import { logger as storageLogger } from '../logger.js';
import { ALL_TABLES, CHECKPOINT_TABLE, COMMODITY_TABLES, RATE_TABLES } from '../schema/tables.js';
import type { TableDefinition } from '../schema/tables.js';
import { createSqlDialect } from '../sql/dialects.js';
import type { SqlDialect } from '../sql/dialects.js';
import type { SqlDriver, SqlExecutor, SqlValue } from '../sql/sql-driver.js';
import {
  commodityFromRow,
  commodityRowValues,
  lastWriteWins,
  rateFromRow,
  rateRowValues,
  requireText,
} from './row-mapping.js';

export type UpsertStrategy = 'bulk-upsert' | 'row-upsert' | 'delete-insert';

export interface RelationalBackendOptions {
  logger?: Logger;
  /** Overrides the dialect derived from the driver */
  dialect?: SqlDialect;
}

interface KeyedRow {
  key: string;
  date: IsoDate;
  keyValues: SqlValue[];
  values: SqlValue[];
}

interface TableBatch {
  table: TableDefinition;
  rows: KeyedRow[];
}

type SchemaState = 'pending' | 'ready' | 'failed';

function keyedRow(table: TableDefinition, values: SqlValue[]): KeyedRow {
  const keyValues = table.primaryKey.map((column) => values[table.dataColumns.indexOf(column)] ?? null);
  return {
    key: keyValues.map((value) => String(value)).join('|'),
    date: String(keyValues[0]),
    keyValues,
    values,
  };
}

/** Last write wins for repeated keys inside one batch */
function dedupe(rows: readonly KeyedRow[]): KeyedRow[] {
  return lastWriteWins(rows, (row) => row.key);
}

export class RelationalBackend implements BackendStrategy {
  readonly kind: string;
  protected dialect: SqlDialect;
  protected readonly logger: Logger;
  private schemaState: SchemaState = 'pending';
  private schemaFailure: Error | null = null;
  private schemaTask: Promise<void> | null = null;

  constructor(
    protected readonly driver: SqlDriver,
    options: RelationalBackendOptions = {}
  ) {
    this.dialect = options.dialect ?? createSqlDialect(driver.dialect);
    if (this.dialect.name !== driver.dialect) {
      throw new ConfigurationError(
        `Dialect ${this.dialect.name} does not match ${driver.dialect} driver`,
        'dialect'
      );
    }
    this.kind = driver.dialect;
    this.logger = (options.logger ?? storageLogger).child({ backend: this.kind });
  }

  /** Hook for engines that pick capabilities at runtime */
  protected async prepareDialect(): Promise<void> {}

  async ensureSchema(): Promise<void> {
    try {
      await this.prepareDialect();
      for (const table of ALL_TABLES) {
        await this.ensureTable(table);
      }
      this.schemaState = 'ready';
      this.schemaFailure = null;
      this.logger.info('Schema ready', { tables: ALL_TABLES.map((table) => table.name) });
    } catch (error) {
      const failure = toError(error);
      this.schemaState = 'failed';
      this.schemaFailure = failure;
      this.logger.error('Schema preparation failed', failure);
      throw failure instanceof SchemaError
        ? failure
        : new SchemaError(`Failed to prepare ${this.kind} schema: ${failure.message}`, {
            backend: this.kind,
          });
    }
  }

  async insertRates(rows: readonly RateObservation[]): Promise<PersistenceResult> {
    const batches: TableBatch[] = SOURCE_TAGS.map((source) => {
      const table = RATE_TABLES[source];
      const tiered = SOURCE_DESCRIPTORS[source].payload === 'tiered';
      return {
        table,
        rows: dedupe(
          rows
            .filter((row) => row.source === source)
            .map((row) => keyedRow(table, rateRowValues(row, tiered)))
        ),
      };
    });
    return this.writeBatches('insertRates', batches);
  }

  async fetchRange(query: RateRangeQuery = {}): Promise<RateObservation[]> {
    assertDateRange(query);
    await this.ready();

    const sources: readonly SourceTag[] = query.source ? [query.source] : SOURCE_TAGS;
    const results: RateObservation[] = [];
    for (const source of sources) {
      const table = RATE_TABLES[source];
      const tiered = SOURCE_DESCRIPTORS[source].payload === 'tiered';
      const rows = await this.selectRange(table, query);
      results.push(...rows.map((row) => rateFromRow(row, source, tiered)));
    }

    return results.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
  }

  async insertCommodity(
    metal: MetalTag,
    rows: readonly CommodityObservation[]
  ): Promise<PersistenceResult> {
    const mismatched = rows.find((row) => row.metal !== metal);
    if (mismatched) {
      throw new ValidationError(
        'INVALID_OBSERVATION',
        `Observation for ${mismatched.metal} passed to ${metal} insert`,
        { metal, date: mismatched.date }
      );
    }
    const table = COMMODITY_TABLES[metal];
    return this.writeBatches('insertCommodity', [
      { table, rows: dedupe(rows.map((row) => keyedRow(table, commodityRowValues(row)))) },
    ]);
  }

  async fetchCommodityRange(metal: MetalTag, range: DateRange = {}): Promise<CommodityObservation[]> {
    assertDateRange(range);
    await this.ready();
    const rows = await this.selectRange(COMMODITY_TABLES[metal], range);
    return rows.map((row) => commodityFromRow(row, metal));
  }

  async readCheckpoint(source: string): Promise<IsoDate | null> {
    await this.ready();
    const { rows } = await this.driver.query(
      `SELECT ${this.dialect.selectDate('last_ingested_date')} AS last_ingested_date ` +
        `FROM ${CHECKPOINT_TABLE.name} WHERE source = ${this.dialect.placeholder(1)}`,
      [source.toUpperCase()]
    );
    const [row] = rows;
    return row ? requireText(row, 'last_ingested_date') : null;
  }

  async writeCheckpoint(source: string, date: IsoDate): Promise<void> {
    const tag = source.toUpperCase();
    const normalized = parseIsoDate(date);
    await this.ready();

    try {
      if (this.dialect.supportsConflictClause) {
        const statement = this.dialect.advanceCheckpoint(tag, normalized);
        await this.driver.query(statement.sql, statement.params);
      } else {
        await this.driver.transaction((tx) => this.advanceCheckpointManually(tx, tag, normalized));
      }
    } catch (error) {
      throw new DatabaseError(
        `Failed to write checkpoint for ${tag}: ${toError(error).message}`,
        'writeCheckpoint',
        { source: tag, date: normalized }
      );
    }
    this.logger.debug('Checkpoint written', { source: tag, date: normalized });
  }

  async listCheckpoints(): Promise<IngestionCheckpoint[]> {
    await this.ready();
    const { rows } = await this.driver.query(
      `SELECT source, ${this.dialect.selectDate('last_ingested_date')} AS last_ingested_date ` +
        `FROM ${CHECKPOINT_TABLE.name} ORDER BY source`
    );
    return rows.map((row) => ({
      source: requireText(row, 'source'),
      lastIngestedDate: requireText(row, 'last_ingested_date'),
    }));
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  /** Rungs of the upsert ladder this engine can use, best first */
  upsertStrategies(): UpsertStrategy[] {
    const strategies: UpsertStrategy[] = [];
    if (this.dialect.supportsConflictClause && this.driver.supportsBulkValues) {
      strategies.push('bulk-upsert');
    }
    if (this.dialect.supportsConflictClause) {
      strategies.push('row-upsert');
    }
    strategies.push('delete-insert');
    return strategies;
  }

  private async ready(): Promise<void> {
    if (this.schemaState === 'ready') {
      return;
    }
    if (this.schemaState === 'failed') {
      throw new SchemaError(
        `${this.kind} schema is not ready: ${this.schemaFailure?.message ?? 'unknown failure'}`,
        { backend: this.kind }
      );
    }
    if (!this.schemaTask) {
      this.schemaTask = this.ensureSchema().finally(() => {
        this.schemaTask = null;
      });
    }
    await this.schemaTask;
  }

  private async ensureTable(table: TableDefinition): Promise<void> {
    await this.driver.query(this.dialect.createTable(table));

    const existing = await this.existingColumns(table.name);
    const missing = table.columns.filter((column) => !existing.has(column.name));
    for (const column of missing) {
      if (table.primaryKey.includes(column.name)) {
        throw new SchemaError(`Table ${table.name} is missing key column ${column.name}`, {
          table: table.name,
          column: column.name,
        });
      }
      await this.driver.query(this.dialect.addColumn(table.name, column));
      this.logger.info('Added column', { table: table.name, column: column.name });
    }

    const retired = table.retiredColumns.filter((column) => existing.has(column));
    if (retired.length > 0) {
      await this.dropColumns(table, retired);
    }
  }

  private async existingColumns(table: string): Promise<Set<string>> {
    const statement = this.dialect.introspectColumns(table);
    const { rows } = await this.driver.query(statement.sql, statement.params);
    const names = new Set<string>();
    for (const row of rows) {
      const name = this.dialect.columnNameFromRow(row);
      if (name) {
        names.add(name.toLowerCase());
      }
    }
    return names;
  }

  private async dropColumns(table: TableDefinition, columns: readonly string[]): Promise<void> {
    if (this.dialect.dropColumnStrategy !== 'rebuild') {
      for (const column of columns) {
        await this.driver.query(this.dialect.dropColumn(table.name, column));
      }
      this.logger.info('Dropped retired columns', { table: table.name, columns: [...columns] });
      return;
    }

    // No DROP COLUMN: copy the kept columns into a fresh table and swap it in
    const rebuilt = `${table.name}__rebuild`;
    const kept = table.columns.map((column) => column.name).join(', ');
    await this.driver.transaction(async (tx) => {
      await tx.query(`DROP TABLE IF EXISTS ${rebuilt}`);
      await tx.query(this.dialect.createTable(table, rebuilt));
      await tx.query(`INSERT INTO ${rebuilt} (${kept}) SELECT ${kept} FROM ${table.name}`);
      await tx.query(`DROP TABLE ${table.name}`);
      await tx.query(`ALTER TABLE ${rebuilt} RENAME TO ${table.name}`);
    });
    this.logger.info('Rebuilt table without retired columns', {
      table: table.name,
      columns: [...columns],
    });
  }

  private async selectRange(table: TableDefinition, range: DateRange) {
    const columns = table.columns
      .filter((column) => column.name !== 'created_at' && column.name !== 'base_currency')
      .map((column) =>
        column.kind === 'date' ? `${this.dialect.selectDate(column.name)} AS ${column.name}` : column.name
      );
    const conditions: string[] = [];
    const params: SqlValue[] = [];
    if (range.start !== undefined) {
      params.push(range.start);
      conditions.push(`rate_date >= ${this.dialect.placeholder(params.length)}`);
    }
    if (range.end !== undefined) {
      params.push(range.end);
      conditions.push(`rate_date <= ${this.dialect.placeholder(params.length)}`);
    }
    const where = conditions.length > 0 ? ` WHERE ${conditions.join(' AND ')}` : '';
    const orderBy = ['rate_date', ...table.primaryKey.filter((column) => column !== 'rate_date')];

    const { rows } = await this.driver.query(
      `SELECT ${columns.join(', ')} FROM ${table.name}${where} ORDER BY ${orderBy.join(', ')}`,
      params
    );
    return rows;
  }

  private async writeBatches(operation: string, batches: readonly TableBatch[]): Promise<PersistenceResult> {
    const pending = batches.filter((batch) => batch.rows.length > 0);
    if (pending.length === 0) {
      return emptyPersistenceResult();
    }
    await this.ready();

    const tables = pending.map((batch) => batch.table.name);
    const rowCount = pending.reduce((total, batch) => total + batch.rows.length, 0);
    const strategies = this.upsertStrategies();

    for (const [index, strategy] of strategies.entries()) {
      const startedAt = Date.now();
      try {
        const result = await this.driver.transaction(async (tx) => {
          let totals = emptyPersistenceResult();
          for (const batch of pending) {
            const existing = await this.existingKeys(tx, batch);
            await this.applyStrategy(tx, strategy, batch);
            const updated = batch.rows.filter((row) => existing.has(row.key)).length;
            totals = addPersistenceResults(totals, { inserted: batch.rows.length - updated, updated });
          }
          return totals;
        });

        LogHelpers.dbQuery(this.logger, operation, tables.join(','), Date.now() - startedAt, {
          strategy,
          rows: rowCount,
          ...result,
        });
        return result;
      } catch (error) {
        const failure = toError(error);
        const next = strategies[index + 1];
        if (next === undefined) {
          this.logger.error('Upsert failed on every strategy', failure, { operation, tables });
          throw new DatabaseError(`${operation} failed on ${this.kind}: ${failure.message}`, operation, {
            tables,
            strategy,
          });
        }
        this.logger.warn('Upsert strategy failed, falling back', {
          operation,
          strategy,
          next,
          error: failure.message,
        });
      }
    }

    throw new DatabaseError(`No upsert strategy available on ${this.kind}`, operation);
  }

  private async existingKeys(tx: SqlExecutor, batch: TableBatch): Promise<Set<string>> {
    const { table, rows } = batch;
    const dates = rows.map((row) => row.date).sort();
    const keyColumns = table.primaryKey.map((column) =>
      column === 'rate_date' ? `${this.dialect.selectDate(column)} AS ${column}` : column
    );
    const result = await tx.query(
      `SELECT ${keyColumns.join(', ')} FROM ${table.name} ` +
        `WHERE rate_date >= ${this.dialect.placeholder(1)} AND rate_date <= ${this.dialect.placeholder(2)}`,
      [dates[0] ?? null, dates[dates.length - 1] ?? null]
    );
    return new Set(
      result.rows.map((row) => table.primaryKey.map((column) => requireText(row, column)).join('|'))
    );
  }

  private async applyStrategy(tx: SqlExecutor, strategy: UpsertStrategy, batch: TableBatch): Promise<void> {
    const { table, rows } = batch;
    const columns = table.dataColumns;

    switch (strategy) {
      case 'bulk-upsert': {
        const rowsPerStatement = Math.max(1, Math.floor(this.dialect.maxParameters / columns.length));
        for (const part of chunk(rows, rowsPerStatement)) {
          const statement = this.dialect.upsert(
            table.name,
            columns,
            table.primaryKey,
            part.map((row) => row.values)
          );
          await tx.query(statement.sql, statement.params);
        }
        return;
      }
      case 'row-upsert':
        for (const row of rows) {
          const statement = this.dialect.upsert(table.name, columns, table.primaryKey, [row.values]);
          await tx.query(statement.sql, statement.params);
        }
        return;
      case 'delete-insert':
        for (const row of rows) {
          const removal = this.dialect.deleteByKey(table.name, table.primaryKey, row.keyValues);
          await tx.query(removal.sql, removal.params);
          const insertion = this.dialect.insert(table.name, columns, [row.values]);
          await tx.query(insertion.sql, insertion.params);
        }
        return;
    }
  }

  private async advanceCheckpointManually(tx: SqlExecutor, source: string, date: IsoDate): Promise<void> {
    const p = (index: number) => this.dialect.placeholder(index);
    const { rows } = await tx.query(
      `SELECT ${this.dialect.selectDate('last_ingested_date')} AS last_ingested_date ` +
        `FROM ${CHECKPOINT_TABLE.name} WHERE source = ${p(1)}`,
      [source]
    );
    const [row] = rows;
    if (!row) {
      const insertion = this.dialect.insert(CHECKPOINT_TABLE.name, CHECKPOINT_TABLE.dataColumns, [[source, date]]);
      await tx.query(insertion.sql, insertion.params);
      return;
    }
    if (date > requireText(row, 'last_ingested_date')) {
      await tx.query(
        `UPDATE ${CHECKPOINT_TABLE.name} SET last_ingested_date = ${p(1)}, updated_at = CURRENT_TIMESTAMP ` +
          `WHERE source = ${p(2)}`,
        [date, source]
      );
    }
  }
}
