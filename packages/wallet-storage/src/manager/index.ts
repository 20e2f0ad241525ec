/**
 * Wallet persistence: schema gate, account registry and secret manager policy.
 */

export * from './keys.js';
export {
	accountSchema,
	accountAddressSchema,
	accountIndexesSchema,
	u32Schema,
	assertAccountIndex,
	parseAccount,
	type Account,
	type AccountAddress,
} from './account.js';
export {
	AccountManagerBuilder,
	accountManagerOptionsSchema,
	parseAccountManagerOptions,
	DEFAULT_COIN_TYPE,
	type AccountManagerOptions,
} from './builder.js';
export {
	SECRET_MANAGER_SNAPSHOT_POLICY,
	secretManagerSnapshotSchema,
	secretManagerFromSnapshot,
	snapshotPolicy,
	StrongholdSecretManager,
	LedgerNanoSecretManager,
	MnemonicSecretManager,
	PlaceholderSecretManager,
	type SecretManager,
	type SecretManagerKind,
	type SecretManagerSnapshot,
	type SnapshotPolicy,
} from './secret-manager.js';
export { StorageManager, type StorageManagerOptions } from './storage-manager.js';
export {
	StorageManagerHandle,
	openStorageManager,
	type OpenStorageManagerOptions,
} from './handle.js';
