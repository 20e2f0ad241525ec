/**
 * IndexedDB plugin for the wallet storage adapter registry.
 * The configured storage path is used as the database name.
 */

import { registerStorageAdapter, type StorageAdapterPlugin } from '@wallet-storage/core';
import { IndexedDBStorageAdapter } from './adapter.js';

export function createIndexedDBPlugin(factory?: IDBFactory): StorageAdapterPlugin {
  return {
    kind: 'indexeddb',
    open(options) {
      return IndexedDBStorageAdapter.open({ name: options.path, factory });
    },
  };
}

/**
 * Register the IndexedDB engine so that `kind: 'indexeddb'` can be opened from config.
 */
export default function register(factory?: IDBFactory): void {
  registerStorageAdapter(createIndexedDBPlugin(factory));
}
