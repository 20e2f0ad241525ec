/**
 * Configuration types for wallet storage.
 */

import { DEFAULT_STORAGE_KIND, DEFAULT_STORAGE_PATH, type StorageKind } from '../common/adapter.js';
import { DATABASE_SCHEMA_VERSION } from '../manager/keys.js';

/**
 * Storage engine selection.
 */
export interface StorageSettings {
	/** Engine to open; its plugin must be registered. */
	kind: StorageKind;
	/** Directory (LevelDB), file (SQLite) or database name (IndexedDB). */
	path: string;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
	/** Debug namespace filter (e.g., 'wallet-storage:*') */
	namespaces?: string;
}

/**
 * Full wallet storage configuration.
 */
export interface WalletStorageConfig {
	storage: StorageSettings;
	/** At-rest encryption key as 64 hex characters. Omit for a plaintext store. */
	encryptionKey?: string;
	/** Schema version the store must carry. */
	schemaVersion: number;
	logging: LoggingConfig;
}

/**
 * Partial config for merging.
 */
export interface PartialWalletStorageConfig {
	storage?: Partial<StorageSettings>;
	encryptionKey?: string;
	schemaVersion?: number;
	logging?: Partial<LoggingConfig>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: WalletStorageConfig = {
	storage: {
		kind: DEFAULT_STORAGE_KIND,
		path: DEFAULT_STORAGE_PATH,
	},
	schemaVersion: DATABASE_SCHEMA_VERSION,
	logging: {},
};
