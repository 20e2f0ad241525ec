/**
 * SQLite-based StorageAdapter implementation for Node.js.
 *
 * Uses better-sqlite3. Records live in one table keyed by text; SQLite's
 * paged B-tree gives single-writer transactions, and every write runs in
 * its own transaction.
 */

import Database from 'better-sqlite3';
import {
  RecordNotFoundError,
  StorageError,
  batchEntries,
  createLogger,
  toStorageError,
  type RecordBatch,
  type StorageAdapter,
} from '@wallet-storage/core';

const log = createLogger('adapter:sqlite');

export const SQLITE_STORAGE_ID = 'sqlite';

/**
 * Options for opening a SQLite adapter.
 */
export interface SQLiteAdapterOptions {
  /** Database file, or ':memory:' for a private in-memory database. */
  path: string;
  /** Table name for the records. Default: 'kv' */
  tableName?: string;
}

/**
 * SQLite implementation of StorageAdapter.
 *
 * Empty keys are rejected by a check constraint inside the write
 * transaction, so a batch containing one rolls back as a whole.
 */
export class SQLiteStorageAdapter implements StorageAdapter {
  private db: Database.Database;
  private tableName: string;
  private closed = false;

  private readonly selectStmt: Database.Statement<[string], { value: string }>;
  private readonly upsertStmt: Database.Statement<[string, string]>;
  private readonly deleteStmt: Database.Statement<[string]>;
  private readonly writeBatch: (entries: Array<[string, string]>) => void;

  private constructor(db: Database.Database, tableName: string) {
    this.db = db;
    this.tableName = tableName;

    // Keys must be non-empty; WITHOUT ROWID keeps the record in the key's B-tree page
    this.db.exec(`
      create table if not exists ${this.tableName} (
        key text primary key check (length(key) > 0),
        value text not null
      ) without rowid
    `);

    this.selectStmt = this.db.prepare<[string], { value: string }>(`select value from ${this.tableName} where key = ?`);
    this.upsertStmt = this.db.prepare<[string, string]>(
      `insert into ${this.tableName} (key, value) values (?, ?) on conflict(key) do update set value = excluded.value`
    );
    this.deleteStmt = this.db.prepare<[string]>(`delete from ${this.tableName} where key = ?`);
    this.writeBatch = this.db.transaction((entries: Array<[string, string]>) => {
      for (const [key, value] of entries) {
        this.upsertStmt.run(key, value);
      }
    });
  }

  /**
   * Open (or create) a SQLite database file.
   */
  static open(options: SQLiteAdapterOptions): SQLiteStorageAdapter {
    let db: Database.Database;
    try {
      db = new Database(options.path);
      if (options.path !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
    } catch (err) {
      throw toStorageError(err);
    }
    log('Opened %s', options.path);
    return new SQLiteStorageAdapter(db, options.tableName ?? 'kv');
  }

  id(): string {
    return SQLITE_STORAGE_ID;
  }

  async get(key: string): Promise<string> {
    this.checkOpen();
    const row = this.guard(() => this.selectStmt.get(key));
    if (row === undefined) {
      throw new RecordNotFoundError(key);
    }
    return row.value;
  }

  async set(key: string, value: string): Promise<void> {
    this.checkOpen();
    this.guard(() => this.upsertStmt.run(key, value));
  }

  async batchSet(records: RecordBatch): Promise<void> {
    this.checkOpen();
    const entries = batchEntries(records);
    if (entries.length === 0) {
      return;
    }
    this.guard(() => this.writeBatch(entries));
  }

  async remove(key: string): Promise<void> {
    this.checkOpen();
    this.guard(() => this.deleteStmt.run(key));
  }

  async close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      this.guard(() => this.db.close());
    }
  }

  private guard<T>(operation: () => T): T {
    try {
      return operation();
    } catch (err) {
      throw toStorageError(err);
    }
  }

  private checkOpen(): void {
    if (this.closed) {
      throw new StorageError('SQLiteStorageAdapter is closed');
    }
  }
}
