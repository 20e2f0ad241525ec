/**
 * Configuration module exports.
 */

export {
	type WalletStorageConfig,
	type PartialWalletStorageConfig,
	type StorageSettings,
	type LoggingConfig,
	DEFAULT_CONFIG,
} from './types.js';

export {
	DEFAULT_CONFIG_FILE,
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
} from './loader.js';

export { openStorageManagerFromConfig } from './open.js';
