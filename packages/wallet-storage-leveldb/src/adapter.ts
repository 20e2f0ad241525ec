/**
 * LevelDB-based StorageAdapter implementation for Node.js.
 *
 * Uses classic-level for LevelDB bindings. LevelDB is log-structured: each
 * write (or batch) is appended to the write-ahead log as one atomic record.
 */

import { ClassicLevel } from 'classic-level';
import {
  RecordNotFoundError,
  StorageError,
  assertValidKey,
  batchEntries,
  createLogger,
  toStorageError,
  type RecordBatch,
  type StorageAdapter,
} from '@wallet-storage/core';

const log = createLogger('adapter:leveldb');

export const LEVELDB_STORAGE_ID = 'leveldb';

/**
 * Options for opening a LevelDB adapter.
 */
export interface LevelDBAdapterOptions {
  /** Directory holding the database. */
  path: string;
  /** Create if doesn't exist. Default: true. */
  createIfMissing?: boolean;
  /** Throw error if already exists. Default: false. */
  errorIfExists?: boolean;
}

/**
 * LevelDB implementation of StorageAdapter.
 */
export class LevelDBStorageAdapter implements StorageAdapter {
  private db: ClassicLevel<string, string>;
  private closed = false;

  private constructor(db: ClassicLevel<string, string>) {
    this.db = db;
  }

  /**
   * Open a LevelDB database.
   */
  static async open(options: LevelDBAdapterOptions): Promise<LevelDBStorageAdapter> {
    const db = new ClassicLevel<string, string>(options.path, {
      keyEncoding: 'utf8',
      valueEncoding: 'utf8',
      createIfMissing: options.createIfMissing ?? true,
      errorIfExists: options.errorIfExists ?? false,
    });

    try {
      await db.open();
    } catch (err) {
      throw toStorageError(err);
    }
    log('Opened %s', options.path);
    return new LevelDBStorageAdapter(db);
  }

  id(): string {
    return LEVELDB_STORAGE_ID;
  }

  async get(key: string): Promise<string> {
    this.checkOpen();
    // classic-level returns undefined for missing keys (doesn't throw)
    const value = await this.guard(() => this.db.get(key));
    if (value === undefined) {
      throw new RecordNotFoundError(key);
    }
    return value;
  }

  async set(key: string, value: string): Promise<void> {
    this.checkOpen();
    assertValidKey(key);
    await this.guard(() => this.db.put(key, value));
  }

  async batchSet(records: RecordBatch): Promise<void> {
    this.checkOpen();
    const entries = batchEntries(records);
    for (const [key] of entries) {
      assertValidKey(key);
    }
    if (entries.length === 0) {
      return;
    }
    await this.guard(() => this.db.batch(
      entries.map(([key, value]) => ({ type: 'put' as const, key, value }))
    ));
  }

  async remove(key: string): Promise<void> {
    this.checkOpen();
    await this.guard(() => this.db.del(key));
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      await this.guard(() => this.db.close());
    }
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (err) {
      throw toStorageError(err);
    }
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StorageError('LevelDBStorageAdapter is closed');
    }
  }
}
