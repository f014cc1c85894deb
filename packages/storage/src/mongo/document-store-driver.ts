/**
 * Document store seam
 *
 * The document backend talks to MongoDB through this interface; tests supply an
 * in-memory implementation.
 */

import type { Document } from 'mongodb';

export interface ReplaceOperation {
  filter: Document;
  replacement: Document;
}

export interface BulkReplaceResult {
  /** Documents created by upsert */
  upserted: number;
  /** Existing documents that matched and were replaced */
  matched: number;
  failures: Array<{ index: number; message: string }>;
}

export interface DocumentStoreDriver {
  ping(): Promise<void>;
  ensureIndex(collection: string, keys: readonly string[], unique: boolean): Promise<void>;
  /**
   * Replace-or-insert every operation in one unordered bulk call; a failing
   * document does not stop the others.
   */
  bulkReplace(collection: string, operations: readonly ReplaceOperation[]): Promise<BulkReplaceResult>;
  /** Ascending by `sortField`, `_id` stripped */
  find(collection: string, filter: Document, sortField: string): Promise<Document[]>;
  findOne(collection: string, filter: Document): Promise<Document | null>;
  /** Upsert that raises `field` to `value` and never lowers it */
  raiseField(collection: string, filter: Document, field: string, value: string): Promise<void>;
  close(): Promise<void>;
}
