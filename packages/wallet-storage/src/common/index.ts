/**
 * Storage primitives: adapter contract, registry, encryption and errors.
 */

// Adapter contract
export type {
	StorageAdapter,
	StorageAdapterOptions,
	StorageAdapterPlugin,
	StorageKind,
	RecordBatch,
} from './adapter.js';
export {
	STORAGE_KINDS,
	DEFAULT_STORAGE_KIND,
	DEFAULT_STORAGE_PATH,
	assertValidKey,
	batchEntries,
	parseStorageKind,
} from './adapter.js';

// Adapter registry
export {
	registerStorageAdapter,
	unregisterStorageAdapter,
	hasStorageAdapter,
	openStorageAdapter,
} from './registry.js';

// In-memory adapter
export { MemoryStorageAdapter, MEMORY_STORAGE_ID, memoryPlugin } from './memory-adapter.js';

// Encryption
export {
	ENCRYPTION_KEY_LENGTH,
	encryptRecord,
	decryptRecord,
	encryptionKeyFromHex,
} from './cipher.js';
export { EncryptedStorage, type RecordSchema } from './storage.js';

// Errors
export {
	StorageErrorCode,
	WalletStorageError,
	RecordNotFoundError,
	StorageError,
	DecryptionError,
	UnsupportedSchemaVersionError,
	InconsistentRegistryError,
	SerializationError,
	SecretManagerError,
	MisuseError,
	toStorageError,
} from './errors.js';

// Logging
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './logger.js';
