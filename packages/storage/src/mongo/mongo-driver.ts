import { MongoBulkWriteError, MongoClient } from 'mongodb';
import type { AnyBulkWriteOperation, Db, Document } from 'mongodb';
import type { BulkReplaceResult, DocumentStoreDriver, ReplaceOperation } from './document-store-driver.js';

export interface MongoDriverConfig {
  url: string;
  database: string;
  serverSelectionTimeoutMS?: number;
}

/**
 * MongoDB driver over a single MongoClient
 */
export class MongoDriver implements DocumentStoreDriver {
  private readonly client: MongoClient;
  private readonly db: Db;

  constructor(config: MongoDriverConfig) {
    this.client = new MongoClient(config.url, {
      serverSelectionTimeoutMS: config.serverSelectionTimeoutMS ?? 30_000,
    });
    this.db = this.client.db(config.database);
  }

  async ping(): Promise<void> {
    await this.db.command({ ping: 1 });
  }

  async ensureIndex(collection: string, keys: readonly string[], unique: boolean): Promise<void> {
    const spec: Record<string, 1> = {};
    for (const key of keys) {
      spec[key] = 1;
    }
    await this.db.collection(collection).createIndex(spec, { unique });
  }

  async bulkReplace(collection: string, operations: readonly ReplaceOperation[]): Promise<BulkReplaceResult> {
    if (operations.length === 0) {
      return { upserted: 0, matched: 0, failures: [] };
    }
    const ops: AnyBulkWriteOperation<Document>[] = operations.map((operation) => ({
      replaceOne: { filter: operation.filter, replacement: operation.replacement, upsert: true },
    }));

    try {
      const result = await this.db.collection(collection).bulkWrite(ops, { ordered: false });
      return { upserted: result.upsertedCount, matched: result.matchedCount, failures: [] };
    } catch (error) {
      if (!(error instanceof MongoBulkWriteError)) {
        throw error;
      }
      const writeErrors = Array.isArray(error.writeErrors) ? error.writeErrors : [error.writeErrors];
      return {
        upserted: error.result.upsertedCount,
        matched: error.result.matchedCount,
        failures: writeErrors.map((writeError) => ({
          index: writeError.index,
          message: writeError.errmsg ?? `code ${writeError.code}`,
        })),
      };
    }
  }

  async find(collection: string, filter: Document, sortField: string): Promise<Document[]> {
    return this.db
      .collection(collection)
      .find(filter, { projection: { _id: 0 } })
      .sort({ [sortField]: 1 })
      .toArray();
  }

  async findOne(collection: string, filter: Document): Promise<Document | null> {
    return this.db.collection(collection).findOne(filter, { projection: { _id: 0 } });
  }

  async raiseField(collection: string, filter: Document, field: string, value: string): Promise<void> {
    await this.db
      .collection(collection)
      .updateOne(filter, { $max: { [field]: value }, $set: { updated_at: new Date() } }, { upsert: true });
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
