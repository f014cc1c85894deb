/**
 * Document-store backend
 * ======================
 * One collection per rate source so the two sources never contend for the same
 * unique index. Each rate collection is keyed by (rate_date, currency_code);
 * the source tag is implied by the collection a document lives in.
 */

import {
  assertDateRange,
  DatabaseError,
  parseIsoDate,
  SchemaError,
  SOURCE_DESCRIPTORS,
  SOURCE_TAGS,
  TIERED_PRICE_FIELDS,
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
import type { Document } from 'mongodb';
import { logger as storageLogger } from '../logger.js';
import type {
  BulkReplaceResult,
  DocumentStoreDriver,
  ReplaceOperation,
} from '../mongo/document-store-driver.js';
import { CHECKPOINT_TABLE, COMMODITY_TABLES, RATE_TABLES, TIERED_COLUMNS } from '../schema/tables.js';
import { lastWriteWins, toNullableNumber } from './row-mapping.js';

export interface MongoBackendOptions {
  logger?: Logger;
}

interface CollectionWrite {
  collection: string;
  attempted: number;
  result: BulkReplaceResult;
}

function readText(document: Document, field: string): string {
  const value: unknown = document[field];
  if (typeof value !== 'string') {
    throw new DatabaseError(`Document field ${field} is not text`, 'read', { field });
  }
  return value;
}

function readNumber(document: Document, field: string): number {
  const value = toNullableNumber(document[field]);
  if (value === null) {
    throw new DatabaseError(`Document field ${field} is not numeric`, 'read', { field });
  }
  return value;
}

function dateFilter(range: DateRange): Document {
  const bounds: Document = {};
  if (range.start !== undefined) {
    bounds.$gte = range.start;
  }
  if (range.end !== undefined) {
    bounds.$lte = range.end;
  }
  return Object.keys(bounds).length > 0 ? { rate_date: bounds } : {};
}

export class MongoBackend implements BackendStrategy {
  readonly kind = 'mongodb';
  private readonly logger: Logger;
  private schemaReady = false;
  private schemaTask: Promise<void> | null = null;

  constructor(
    private readonly driver: DocumentStoreDriver,
    options: MongoBackendOptions = {}
  ) {
    this.logger = (options.logger ?? storageLogger).child({ backend: this.kind });
  }

  async ensureSchema(): Promise<void> {
    try {
      await this.driver.ping();
      for (const source of SOURCE_TAGS) {
        await this.driver.ensureIndex(RATE_TABLES[source].name, ['rate_date', 'currency_code'], true);
      }
      for (const table of Object.values(COMMODITY_TABLES)) {
        await this.driver.ensureIndex(table.name, ['rate_date'], true);
      }
      await this.driver.ensureIndex(CHECKPOINT_TABLE.name, ['source'], true);
      this.schemaReady = true;
      this.logger.info('Collections and indexes ready');
    } catch (error) {
      this.schemaReady = false;
      const failure = toError(error);
      this.logger.error('Schema preparation failed', failure);
      throw new SchemaError(`Failed to prepare MongoDB collections: ${failure.message}`, {
        backend: this.kind,
      });
    }
  }

  async insertRates(rows: readonly RateObservation[]): Promise<PersistenceResult> {
    if (rows.length === 0) {
      return { inserted: 0, updated: 0 };
    }
    await this.ready();

    // Every collection is written before any failure is reported
    const writes: CollectionWrite[] = [];
    for (const source of SOURCE_TAGS) {
      const tiered = SOURCE_DESCRIPTORS[source].payload === 'tiered';
      const sourceRows = lastWriteWins(
        rows.filter((row) => row.source === source),
        (row) => `${row.date}|${row.currencyCode}`
      );
      const operations = sourceRows.map((row): ReplaceOperation => {
        const replacement: Document = {
          rate_date: row.date,
          currency_code: row.currencyCode,
          rate: row.rate,
          base_currency: 'INR',
        };
        if (tiered) {
          for (const field of TIERED_PRICE_FIELDS) {
            replacement[TIERED_COLUMNS[field]] = row[field] ?? null;
          }
        }
        return { filter: { rate_date: row.date, currency_code: row.currencyCode }, replacement };
      });
      const write = await this.bulkReplace('insertRates', RATE_TABLES[source].name, operations);
      if (write) {
        writes.push(write);
      }
    }
    return this.settle('insertRates', writes);
  }

  async fetchRange(query: RateRangeQuery = {}): Promise<RateObservation[]> {
    assertDateRange(query);
    await this.ready();

    const sources: readonly SourceTag[] = query.source ? [query.source] : SOURCE_TAGS;
    const results: RateObservation[] = [];
    for (const source of sources) {
      const tiered = SOURCE_DESCRIPTORS[source].payload === 'tiered';
      const documents = await this.driver.find(RATE_TABLES[source].name, dateFilter(query), 'rate_date');
      for (const document of documents) {
        const observation: RateObservation = {
          date: readText(document, 'rate_date'),
          currencyCode: readText(document, 'currency_code'),
          source,
          rate: readNumber(document, 'rate'),
        };
        if (tiered) {
          for (const field of TIERED_PRICE_FIELDS) {
            observation[field] = toNullableNumber(document[TIERED_COLUMNS[field]]);
          }
        }
        results.push(observation);
      }
    }

    return results.sort((a, b) =>
      a.date < b.date ? -1 : a.date > b.date ? 1 : a.currencyCode.localeCompare(b.currencyCode)
    );
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
    if (rows.length === 0) {
      return { inserted: 0, updated: 0 };
    }
    await this.ready();

    const operations = lastWriteWins(rows, (row) => row.date).map((row): ReplaceOperation => ({
      filter: { rate_date: row.date },
      replacement: {
        rate_date: row.date,
        price: row.spotPrice ?? null,
        price_3_month: row.forward3mPrice ?? null,
        stock: row.stockQuantity ?? null,
      },
    }));
    const write = await this.bulkReplace('insertCommodity', COMMODITY_TABLES[metal].name, operations);
    return this.settle('insertCommodity', write ? [write] : []);
  }

  async fetchCommodityRange(metal: MetalTag, range: DateRange = {}): Promise<CommodityObservation[]> {
    assertDateRange(range);
    await this.ready();
    const documents = await this.driver.find(COMMODITY_TABLES[metal].name, dateFilter(range), 'rate_date');
    return documents.map((document) => ({
      date: readText(document, 'rate_date'),
      metal,
      spotPrice: toNullableNumber(document.price),
      forward3mPrice: toNullableNumber(document.price_3_month),
      stockQuantity: toNullableNumber(document.stock),
    }));
  }

  async readCheckpoint(source: string): Promise<IsoDate | null> {
    await this.ready();
    const document = await this.driver.findOne(CHECKPOINT_TABLE.name, { source: source.toUpperCase() });
    return document ? readText(document, 'last_ingested_date') : null;
  }

  async writeCheckpoint(source: string, date: IsoDate): Promise<void> {
    const tag = source.toUpperCase();
    const normalized = parseIsoDate(date);
    await this.ready();
    // $max compares the ISO strings, which order the same way as the dates
    await this.driver.raiseField(CHECKPOINT_TABLE.name, { source: tag }, 'last_ingested_date', normalized);
    this.logger.debug('Checkpoint written', { source: tag, date: normalized });
  }

  async listCheckpoints(): Promise<IngestionCheckpoint[]> {
    await this.ready();
    const documents = await this.driver.find(CHECKPOINT_TABLE.name, {}, 'source');
    return documents.map((document) => ({
      source: readText(document, 'source'),
      lastIngestedDate: readText(document, 'last_ingested_date'),
    }));
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async ready(): Promise<void> {
    if (this.schemaReady) {
      return;
    }
    if (!this.schemaTask) {
      this.schemaTask = this.ensureSchema().finally(() => {
        this.schemaTask = null;
      });
    }
    await this.schemaTask;
  }

  private async bulkReplace(
    operation: string,
    collection: string,
    operations: readonly ReplaceOperation[]
  ): Promise<CollectionWrite | null> {
    if (operations.length === 0) {
      return null;
    }
    const startedAt = Date.now();
    const result = await this.driver.bulkReplace(collection, operations);
    LogHelpers.dbQuery(this.logger, operation, collection, Date.now() - startedAt, {
      documents: operations.length,
      upserted: result.upserted,
      matched: result.matched,
      failed: result.failures.length,
    });
    return { collection, attempted: operations.length, result };
  }

  /**
   * Sum the per-collection counts, or raise one DatabaseError covering every
   * collection that reported failed documents
   */
  private settle(operation: string, writes: readonly CollectionWrite[]): PersistenceResult {
    const failed = writes.filter((write) => write.result.failures.length > 0);
    if (failed.length > 0) {
      const details = failed.map(
        ({ collection, attempted, result }) =>
          `wrote ${result.upserted + result.matched} of ${attempted} documents to ${collection}; ` +
          `${result.failures.length} failed: ${result.failures[0]?.message ?? ''}`
      );
      throw new DatabaseError(`${operation} ${details.join('; ')}`, operation, {
        collections: writes.map(({ collection, attempted, result }) => ({
          collection,
          attempted,
          upserted: result.upserted,
          matched: result.matched,
          failures: result.failures,
        })),
      });
    }
    return writes.reduce<PersistenceResult>(
      (totals, { result }) => ({
        inserted: totals.inserted + result.upserted,
        updated: totals.updated + result.matched,
      }),
      { inserted: 0, updated: 0 }
    );
  }
}
