/**
 * IndexedDB-based StorageAdapter implementation for browsers.
 *
 * One database per wallet, with a single object store of records. Every
 * write opens its own readwrite transaction; IndexedDB commits a
 * transaction atomically and serializes overlapping readwrite transactions.
 */

import {
  RecordNotFoundError,
  StorageError,
  assertValidKey,
  batchEntries,
  createLogger,
  type RecordBatch,
  type StorageAdapter,
} from '@wallet-storage/core';

const log = createLogger('adapter:indexeddb');

export const INDEXEDDB_STORAGE_ID = 'indexeddb';

const RECORDS_STORE_NAME = 'records';
const DB_VERSION = 1;

/**
 * Options for opening an IndexedDB adapter.
 */
export interface IndexedDBAdapterOptions {
  /** Database name. */
  name: string;
  /** IndexedDB implementation. Default: globalThis.indexedDB */
  factory?: IDBFactory;
  /** Give up opening after this many milliseconds. Default: 10000 */
  openTimeoutMs?: number;
}

/**
 * IndexedDB implementation of StorageAdapter.
 */
export class IndexedDBStorageAdapter implements StorageAdapter {
  private db: IDBDatabase;
  private closed = false;

  private constructor(db: IDBDatabase) {
    this.db = db;
  }

  /**
   * Open (or create) the database and its record store.
   */
  static async open(options: IndexedDBAdapterOptions): Promise<IndexedDBStorageAdapter> {
    const factory = options.factory ?? globalThis.indexedDB;
    if (!factory) {
      throw new StorageError('IndexedDB is not available in this environment');
    }
    const db = await openDatabase(factory, options.name, options.openTimeoutMs ?? 10000);
    log('Opened %s', options.name);
    return new IndexedDBStorageAdapter(db);
  }

  id(): string {
    return INDEXEDDB_STORAGE_ID;
  }

  async get(key: string): Promise<string> {
    this.checkOpen();
    const result = await new Promise<unknown>((resolve, reject) => {
      const tx = this.db.transaction(RECORDS_STORE_NAME, 'readonly');
      const request = tx.objectStore(RECORDS_STORE_NAME).get(key);
      request.onerror = () => reject(wrapError(request.error, `get ${key}`));
      request.onsuccess = () => resolve(request.result);
    });
    if (result === undefined) {
      throw new RecordNotFoundError(key);
    }
    if (typeof result !== 'string') {
      throw new StorageError(`record ${key} is not text`);
    }
    return result;
  }

  async set(key: string, value: string): Promise<void> {
    this.checkOpen();
    assertValidKey(key);
    await this.write(store => {
      store.put(value, key);
    });
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
    await this.write(store => {
      for (const [key, value] of entries) {
        store.put(value, key);
      }
    });
  }

  async remove(key: string): Promise<void> {
    this.checkOpen();
    await this.write(store => {
      store.delete(key);
    });
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.db.close();
    }
  }

  /**
   * Run requests in one readwrite transaction; resolves once it commits.
   */
  private write(fill: (store: IDBObjectStore) => void): Promise<void> {
    return new Promise((resolve, reject) => {
      const tx = this.db.transaction(RECORDS_STORE_NAME, 'readwrite');
      tx.oncomplete = () => resolve();
      tx.onerror = () => reject(wrapError(tx.error, 'write'));
      tx.onabort = () => reject(wrapError(tx.error, 'write aborted'));
      try {
        fill(tx.objectStore(RECORDS_STORE_NAME));
      } catch (err) {
        tx.abort();
        reject(wrapError(err, 'write'));
      }
    });
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StorageError('IndexedDBStorageAdapter is closed');
    }
  }
}

function openDatabase(factory: IDBFactory, name: string, timeoutMs: number): Promise<IDBDatabase> {
  return new Promise((resolve, reject) => {
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      reject(new StorageError(`IndexedDB open timed out after ${timeoutMs} ms`));
    }, timeoutMs);

    const request = factory.open(name, DB_VERSION);

    request.onerror = () => {
      clearTimeout(timeout);
      reject(wrapError(request.error, 'open'));
    };

    request.onblocked = () => {
      log('Open of %s blocked by another connection', name);
    };

    request.onupgradeneeded = () => {
      const db = request.result;
      if (!db.objectStoreNames.contains(RECORDS_STORE_NAME)) {
        db.createObjectStore(RECORDS_STORE_NAME);
      }
    };

    request.onsuccess = () => {
      clearTimeout(timeout);
      const db = request.result;
      if (timedOut) {
        // The caller already gave up; nobody else holds this connection
        log('Closing %s opened after timeout', name);
        db.close();
        return;
      }
      // Let a newer version (e.g. deleteDatabase from another tab) proceed
      db.onversionchange = () => db.close();
      resolve(db);
    };
  });
}

function wrapError(error: unknown, operation: string): StorageError {
  const detail = error instanceof Error ? error.message : String(error ?? 'unknown error');
  return new StorageError(`IndexedDB ${operation} failed: ${detail}`, error);
}
