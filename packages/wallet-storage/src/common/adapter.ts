/**
 * Storage adapter contract.
 * Implemented by MemoryStorageAdapter (here) and by the SQLite, LevelDB and
 * IndexedDB plugin packages.
 */

import { MisuseError, StorageError } from './errors.js';

/**
 * Closed set of storage engines an adapter can be registered for.
 */
export type StorageKind = 'sqlite' | 'leveldb' | 'memory' | 'indexeddb';

export const STORAGE_KINDS: readonly StorageKind[] = ['sqlite', 'leveldb', 'memory', 'indexeddb'];

/** Engine used when the configuration names none. */
export const DEFAULT_STORAGE_KIND: StorageKind = 'sqlite';

/** Path (or database name) used when the configuration names none. */
export const DEFAULT_STORAGE_PATH = './storage';

/**
 * Records passed to a batch write, keyed by record key.
 */
export type RecordBatch = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

/**
 * Capability contract for a storage engine.
 *
 * Keys are non-empty strings and values UTF-8 text. Every engine failure is
 * reported as a StorageError.
 */
export interface StorageAdapter {
	/**
	 * Static identifier of the engine, for diagnostics.
	 */
	id(): string;

	/**
	 * Get the value stored under a key.
	 * @throws RecordNotFoundError if the key is absent.
	 */
	get(key: string): Promise<string>;

	/**
	 * Upsert a value. Committed once the promise resolves.
	 */
	set(key: string, value: string): Promise<void>;

	/**
	 * Write all records as one atomic unit: either every entry becomes
	 * visible or none does.
	 */
	batchSet(records: RecordBatch): Promise<void>;

	/**
	 * Delete a key. Removing an absent key is not an error.
	 */
	remove(key: string): Promise<void>;

	/**
	 * Close the engine and release its resources.
	 */
	close(): Promise<void>;
}

/**
 * Options for opening an adapter through the registry.
 */
export interface StorageAdapterOptions {
	/** Directory (LevelDB), file (SQLite) or database name (IndexedDB). */
	path: string;
}

/**
 * A storage engine plugin: opens adapters of one kind.
 */
export interface StorageAdapterPlugin {
	readonly kind: StorageKind;
	open(options: StorageAdapterOptions): Promise<StorageAdapter>;
}

/**
 * Normalize a batch to an array of entries.
 */
export function batchEntries(records: RecordBatch): Array<[string, string]> {
	if (isRecordMap(records)) {
		return Array.from(records.entries());
	}
	return Object.entries(records);
}

function isRecordMap(records: RecordBatch): records is ReadonlyMap<string, string> {
	return records instanceof Map;
}

/**
 * Reject empty keys. Engines without a native constraint call this before
 * touching storage.
 */
export function assertValidKey(key: string): void {
	if (key.length === 0) {
		throw new StorageError('record key must not be empty');
	}
}

/**
 * Narrow an arbitrary string to a StorageKind.
 */
export function parseStorageKind(value: string): StorageKind {
	const kind = STORAGE_KINDS.find(k => k === value);
	if (!kind) {
		throw new MisuseError(`unknown storage kind '${value}'. Supported: ${STORAGE_KINDS.join(', ')}`);
	}
	return kind;
}
