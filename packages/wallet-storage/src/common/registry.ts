/**
 * Adapter registry.
 *
 * Storage engines live in separate plugin packages so that a wallet only
 * installs the native bindings it uses:
 *   - @wallet-storage/plugin-sqlite (Node.js, paged B-tree)
 *   - @wallet-storage/plugin-leveldb (Node.js, log-structured)
 *   - @wallet-storage/plugin-indexeddb (browser)
 * The in-memory engine is always available.
 */

import type { StorageAdapter, StorageAdapterOptions, StorageAdapterPlugin, StorageKind } from './adapter.js';
import { StorageError } from './errors.js';
import { createLogger } from './logger.js';
import { memoryPlugin } from './memory-adapter.js';

const log = createLogger('registry');

const PLUGIN_PACKAGES: Record<StorageKind, string> = {
	sqlite: '@wallet-storage/plugin-sqlite',
	leveldb: '@wallet-storage/plugin-leveldb',
	memory: '@wallet-storage/core',
	indexeddb: '@wallet-storage/plugin-indexeddb',
};

const plugins = new Map<StorageKind, StorageAdapterPlugin>([[memoryPlugin.kind, memoryPlugin]]);

/**
 * Register (or replace) the plugin for a storage kind.
 */
export function registerStorageAdapter(plugin: StorageAdapterPlugin): void {
	log('Registering %s adapter', plugin.kind);
	plugins.set(plugin.kind, plugin);
}

/**
 * Remove the plugin for a storage kind. The memory engine can be removed too;
 * re-register memoryPlugin to restore it.
 */
export function unregisterStorageAdapter(kind: StorageKind): void {
	plugins.delete(kind);
}

/**
 * Check whether a storage kind has a registered plugin.
 */
export function hasStorageAdapter(kind: StorageKind): boolean {
	return plugins.has(kind);
}

/**
 * Open an adapter of the given kind through its registered plugin.
 * @throws StorageError if no plugin is registered for the kind.
 */
export async function openStorageAdapter(kind: StorageKind, options: StorageAdapterOptions): Promise<StorageAdapter> {
	const plugin = plugins.get(kind);
	if (!plugin) {
		throw new StorageError(
			`no storage adapter registered for '${kind}'. ` +
			`Install ${PLUGIN_PACKAGES[kind]} and call its register() first.`
		);
	}
	log('Opening %s adapter at %s', kind, options.path);
	return plugin.open(options);
}
