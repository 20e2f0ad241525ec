/**
 * LevelDB plugin for the wallet storage adapter registry.
 */

import { registerStorageAdapter, type StorageAdapterPlugin } from '@wallet-storage/core';
import { LevelDBStorageAdapter } from './adapter.js';

export const leveldbPlugin: StorageAdapterPlugin = {
  kind: 'leveldb',
  open(options) {
    return LevelDBStorageAdapter.open({ path: options.path });
  },
};

/**
 * Register the LevelDB engine so that `kind: 'leveldb'` can be opened from config.
 */
export default function register(): void {
  registerStorageAdapter(leveldbPlugin);
}
