/**
 * SQLite storage plugin for wallet storage.
 *
 * @example Registering the plugin
 * ```typescript
 * import { loadConfig, openStorageManagerFromConfig } from '@wallet-storage/core';
 * import { register } from '@wallet-storage/plugin-sqlite';
 *
 * register();
 * const handle = await openStorageManagerFromConfig(loadConfig());
 * ```
 *
 * @example Using the adapter directly
 * ```typescript
 * import { openStorageManager } from '@wallet-storage/core';
 * import { SQLiteStorageAdapter } from '@wallet-storage/plugin-sqlite';
 *
 * const adapter = SQLiteStorageAdapter.open({ path: './wallet.sqlite' });
 * const handle = await openStorageManager({ adapter });
 * ```
 */

export { SQLiteStorageAdapter, SQLITE_STORAGE_ID, type SQLiteAdapterOptions } from './adapter.js';
export { sqlitePlugin, default as register } from './plugin.js';
