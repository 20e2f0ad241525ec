/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { parseStorageKind } from '../common/adapter.js';
import { encryptionKeyFromHex } from '../common/cipher.js';
import { MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { schemaVersionSchema } from '../manager/keys.js';
import {
	type PartialWalletStorageConfig,
	type WalletStorageConfig,
	DEFAULT_CONFIG,
} from './types.js';

const configLog = createLogger('config');

/** Config file looked up in the working directory when no path is given. */
export const DEFAULT_CONFIG_FILE = 'wallet-storage.json';

const configFileSchema = z.object({
	storage: z.object({
		kind: z.string().optional(),
		path: z.string().min(1).optional(),
	}).optional(),
	encryptionKey: z.string().optional(),
	schemaVersion: schemaVersionSchema.optional(),
	logging: z.object({
		namespaces: z.string().optional(),
	}).optional(),
}).strict();

/**
 * Load configuration from a JSON file. A missing file yields an empty config.
 */
export function loadConfigFile(configPath: string): PartialWalletStorageConfig {
	const resolved = resolve(configPath);
	if (!existsSync(resolved)) {
		configLog('Config file not found: %s', resolved);
		return {};
	}

	let raw: unknown;
	try {
		raw = JSON.parse(readFileSync(resolved, 'utf-8'));
	} catch (err) {
		configLog('Failed to parse config file %s: %O', resolved, err);
		throw new MisuseError(`Failed to parse config file: ${resolved}`);
	}

	const parsed = configFileSchema.safeParse(raw);
	if (!parsed.success) {
		throw new MisuseError(`Invalid config file ${resolved}: ${parsed.error.issues.map(i => i.message).join('; ')}`);
	}
	configLog('Loaded config from %s', resolved);

	const { storage, ...rest } = parsed.data;
	const config: PartialWalletStorageConfig = { ...rest };
	if (storage) {
		config.storage = {};
		if (storage.kind !== undefined) config.storage.kind = parseStorageKind(storage.kind);
		if (storage.path !== undefined) config.storage.path = storage.path;
	}
	return config;
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialWalletStorageConfig {
	const config: PartialWalletStorageConfig = {};

	if (env.WALLET_STORAGE_KIND) {
		config.storage = { ...config.storage, kind: parseStorageKind(env.WALLET_STORAGE_KIND) };
	}
	if (env.WALLET_STORAGE_PATH) {
		config.storage = { ...config.storage, path: env.WALLET_STORAGE_PATH };
	}
	if (env.WALLET_STORAGE_ENCRYPTION_KEY) {
		config.encryptionKey = env.WALLET_STORAGE_ENCRYPTION_KEY;
	}
	if (env.WALLET_STORAGE_DEBUG) {
		config.logging = { namespaces: env.WALLET_STORAGE_DEBUG };
	}

	return config;
}

/**
 * Merge configuration objects; later sources win.
 */
function mergeConfig(
	base: WalletStorageConfig,
	...overrides: PartialWalletStorageConfig[]
): WalletStorageConfig {
	const result: WalletStorageConfig = {
		...base,
		storage: { ...base.storage },
		logging: { ...base.logging },
	};

	for (const override of overrides) {
		if (override.storage) {
			result.storage = { ...result.storage, ...override.storage };
		}
		if (override.encryptionKey !== undefined) result.encryptionKey = override.encryptionKey;
		if (override.schemaVersion !== undefined) result.schemaVersion = override.schemaVersion;
		if (override.logging) {
			result.logging = { ...result.logging, ...override.logging };
		}
	}

	return result;
}

/**
 * Load full configuration from all sources.
 * @throws MisuseError if the merged encryption key is not 64 hex characters.
 */
export function loadConfig(options: {
	configPath?: string;
	env?: NodeJS.ProcessEnv;
	overrides?: PartialWalletStorageConfig;
} = {}): WalletStorageConfig {
	const sources: PartialWalletStorageConfig[] = [];

	const configPath = options.configPath ?? DEFAULT_CONFIG_FILE;
	if (options.configPath || existsSync(configPath)) {
		sources.push(loadConfigFile(configPath));
	}

	sources.push(loadEnvConfig(options.env));

	if (options.overrides) {
		sources.push(options.overrides);
	}

	const config = mergeConfig(DEFAULT_CONFIG, ...sources);
	if (config.encryptionKey !== undefined) {
		encryptionKeyFromHex(config.encryptionKey);
	}
	configLog('Final config: kind=%s path=%s encrypted=%s', config.storage.kind, config.storage.path, config.encryptionKey !== undefined);

	return config;
}
