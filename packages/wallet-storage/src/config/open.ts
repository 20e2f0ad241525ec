/**
 * Open a storage manager from a loaded configuration.
 */

import { encryptionKeyFromHex } from '../common/cipher.js';
import { enableLogging } from '../common/logger.js';
import { openStorageAdapter } from '../common/registry.js';
import { openStorageManager, type StorageManagerHandle } from '../manager/handle.js';
import type { WalletStorageConfig } from './types.js';

/**
 * Apply the logging filter, open the configured engine through the adapter
 * registry and run the schema gate.
 *
 * @throws StorageError if no plugin is registered for `config.storage.kind`.
 */
export async function openStorageManagerFromConfig(config: WalletStorageConfig): Promise<StorageManagerHandle> {
	if (config.logging.namespaces) {
		enableLogging(config.logging.namespaces);
	}

	const encryptionKey = config.encryptionKey === undefined
		? undefined
		: encryptionKeyFromHex(config.encryptionKey);
	const adapter = await openStorageAdapter(config.storage.kind, { path: config.storage.path });

	return openStorageManager({
		adapter,
		encryptionKey,
		schemaVersion: config.schemaVersion,
	});
}
