/**
 * Shared, serialized access to a StorageManager.
 */

import type { StorageAdapter } from '../common/adapter.js';
import { MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { EncryptedStorage } from '../common/storage.js';
import { StorageManager, type StorageManagerOptions } from './storage-manager.js';

const log = createLogger('handle');

/**
 * Owns a StorageManager and runs one operation on it at a time, in call
 * order. The lock is released however the operation ends, so a rejected
 * operation never blocks the ones queued behind it.
 */
export class StorageManagerHandle {
	private readonly manager: StorageManager;
	private tail: Promise<void> = Promise.resolve();
	private closing: Promise<void> | undefined;

	constructor(manager: StorageManager) {
		this.manager = manager;
	}

	/**
	 * Run an operation with exclusive access to the manager.
	 * Resolves or rejects with the operation's own result.
	 */
	run<T>(operation: (manager: StorageManager) => Promise<T>): Promise<T> {
		if (this.closing) {
			return Promise.reject(new MisuseError('storage manager handle is closed'));
		}
		const result = this.tail.then(() => operation(this.manager));
		// The queue only tracks completion; the outcome reaches the caller through `result`
		this.tail = result.then(releaseLock, releaseLock);
		return result;
	}

	get isClosed(): boolean {
		return this.closing !== undefined;
	}

	/**
	 * Close the manager once every queued operation has finished.
	 * Every call resolves only after the manager is closed.
	 */
	close(): Promise<void> {
		if (!this.closing) {
			this.closing = this.run(manager => manager.close());
			log('Handle closing');
		}
		return this.closing;
	}
}

function releaseLock(): void {
	// next queued operation may start
}

export interface OpenStorageManagerOptions extends StorageManagerOptions {
	/** Engine to store records in. Owned by the returned handle. */
	adapter: StorageAdapter;
	/** Optional 32-byte key for at-rest encryption. */
	encryptionKey?: Uint8Array;
}

/**
 * Build EncryptedStorage over an adapter, run the schema version gate and
 * wrap the manager in a handle.
 *
 * The adapter is closed again if the gate fails.
 */
export async function openStorageManager(options: OpenStorageManagerOptions): Promise<StorageManagerHandle> {
	const storage = new EncryptedStorage(options.adapter, options.encryptionKey);
	let manager: StorageManager;
	try {
		manager = await StorageManager.open(storage, { schemaVersion: options.schemaVersion });
	} catch (err) {
		await storage.close();
		throw err;
	}
	log('Opened storage manager on %s (encrypted: %s)', manager.id(), manager.isEncrypted);
	return new StorageManagerHandle(manager);
}
