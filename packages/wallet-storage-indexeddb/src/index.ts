/**
 * IndexedDB storage plugin for wallet storage.
 *
 * Provides persistent storage in browsers.
 *
 * @example
 * ```typescript
 * import { openStorageManager } from '@wallet-storage/core';
 * import { IndexedDBStorageAdapter } from '@wallet-storage/plugin-indexeddb';
 *
 * const adapter = await IndexedDBStorageAdapter.open({ name: 'my-wallet' });
 * const handle = await openStorageManager({ adapter });
 * ```
 */

export { IndexedDBStorageAdapter, INDEXEDDB_STORAGE_ID, type IndexedDBAdapterOptions } from './adapter.js';
export { createIndexedDBPlugin, default as register } from './plugin.js';
