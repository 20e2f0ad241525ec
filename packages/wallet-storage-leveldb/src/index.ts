/**
 * LevelDB storage plugin for wallet storage.
 *
 * Provides LevelDB-based persistent storage for Node.js environments.
 *
 * @example Using the adapter directly
 * ```typescript
 * import { openStorageManager } from '@wallet-storage/core';
 * import { LevelDBStorageAdapter } from '@wallet-storage/plugin-leveldb';
 *
 * const adapter = await LevelDBStorageAdapter.open({ path: './wallet-db' });
 * const handle = await openStorageManager({ adapter, encryptionKey });
 * ```
 */

export { LevelDBStorageAdapter, LEVELDB_STORAGE_ID, type LevelDBAdapterOptions } from './adapter.js';
export { leveldbPlugin, default as register } from './plugin.js';
