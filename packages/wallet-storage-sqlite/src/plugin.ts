/**
 * SQLite plugin for the wallet storage adapter registry.
 */

import { registerStorageAdapter, type StorageAdapterPlugin } from '@wallet-storage/core';
import { SQLiteStorageAdapter } from './adapter.js';

export const sqlitePlugin: StorageAdapterPlugin = {
  kind: 'sqlite',
  async open(options) {
    return SQLiteStorageAdapter.open({ path: options.path });
  },
};

/**
 * Register the SQLite engine so that `kind: 'sqlite'` can be opened from config.
 */
export default function register(): void {
  registerStorageAdapter(sqlitePlugin);
}
