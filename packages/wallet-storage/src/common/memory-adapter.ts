/**
 * In-memory StorageAdapter implementation.
 *
 * Useful for:
 * - Testing without filesystem/IndexedDB dependencies
 * - Ephemeral wallets that must leave nothing on disk
 */

import {
	assertValidKey,
	batchEntries,
	type RecordBatch,
	type StorageAdapter,
	type StorageAdapterPlugin,
} from './adapter.js';
import { RecordNotFoundError, StorageError } from './errors.js';

export const MEMORY_STORAGE_ID = 'memory';

/**
 * In-memory implementation of StorageAdapter backed by a Map.
 *
 * Every operation runs synchronously inside its promise, so a batch is
 * validated in full and then applied without interleaving.
 */
export class MemoryStorageAdapter implements StorageAdapter {
	private data = new Map<string, string>();
	private closed = false;

	id(): string {
		return MEMORY_STORAGE_ID;
	}

	async get(key: string): Promise<string> {
		this.checkOpen();
		const value = this.data.get(key);
		if (value === undefined) {
			throw new RecordNotFoundError(key);
		}
		return value;
	}

	async set(key: string, value: string): Promise<void> {
		this.checkOpen();
		assertValidKey(key);
		this.data.set(key, value);
	}

	async batchSet(records: RecordBatch): Promise<void> {
		this.checkOpen();
		const entries = batchEntries(records);
		for (const [key] of entries) {
			assertValidKey(key);
		}
		for (const [key, value] of entries) {
			this.data.set(key, value);
		}
	}

	async remove(key: string): Promise<void> {
		this.checkOpen();
		this.data.delete(key);
	}

	async close(): Promise<void> {
		this.closed = true;
		this.data.clear();
	}

	/**
	 * Get the number of records in the store.
	 */
	get size(): number {
		return this.data.size;
	}

	/**
	 * Raw value as committed, bypassing the contract. Lets callers inspect
	 * exactly what reached the adapter boundary.
	 */
	peek(key: string): string | undefined {
		return this.data.get(key);
	}

	private checkOpen(): void {
		if (this.closed) {
			throw new StorageError('MemoryStorageAdapter is closed');
		}
	}
}

/**
 * Plugin entry for the adapter registry. The path is ignored.
 */
export const memoryPlugin: StorageAdapterPlugin = {
	kind: 'memory',
	async open() {
		return new MemoryStorageAdapter();
	},
};
