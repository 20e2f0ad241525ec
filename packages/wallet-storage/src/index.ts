/**
 * Wallet storage core.
 *
 * Provides the StorageAdapter contract, transparent record encryption and the
 * StorageManager. Concrete engines are in separate plugin packages:
 *   - @wallet-storage/plugin-sqlite (Node.js)
 *   - @wallet-storage/plugin-leveldb (Node.js)
 *   - @wallet-storage/plugin-indexeddb (Browser)
 *
 * Usage:
 *   import { openStorageManager, MemoryStorageAdapter } from '@wallet-storage/core';
 *
 *   const handle = await openStorageManager({ adapter: new MemoryStorageAdapter() });
 *   const accounts = await handle.run(manager => manager.getAccounts());
 */

export * from './common/index.js';
export * from './manager/index.js';
export * from './config/index.js';
