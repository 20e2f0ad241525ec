/**
 * StorageManager - wallet persistence on top of EncryptedStorage.
 *
 * Responsibilities:
 *   - schema version gate on open
 *   - account index registry (lazily loaded, cached)
 *   - account manager options and the secret manager snapshot policy
 *
 * A manager is not safe for concurrent use; share it through a
 * StorageManagerHandle, which serializes operations.
 */

import { InconsistentRegistryError, MisuseError, UnsupportedSchemaVersionError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { EncryptedStorage, RecordSchema } from '../common/storage.js';
import { accountIndexesSchema, accountSchema, assertAccountIndex, parseAccount, type Account } from './account.js';
import { AccountManagerBuilder, accountManagerOptionsSchema, parseAccountManagerOptions } from './builder.js';
import {
	ACCOUNTS_INDEXATION_KEY,
	ACCOUNT_MANAGER_INDEXATION_KEY,
	DATABASE_SCHEMA_VERSION,
	DATABASE_SCHEMA_VERSION_KEY,
	SECRET_MANAGER_KEY,
	buildAccountKey,
	schemaVersionSchema,
} from './keys.js';
import {
	secretManagerFromSnapshot,
	secretManagerSnapshotSchema,
	snapshotPolicy,
} from './secret-manager.js';

const log = createLogger('manager');

export interface StorageManagerOptions {
	/**
	 * Schema version this process expects.
	 * @default DATABASE_SCHEMA_VERSION
	 */
	schemaVersion?: number;
}

/**
 * Registry cache. 'unloaded' and a loaded empty registry behave the same
 * for every operation; the distinction only avoids re-reading storage.
 */
type RegistryState =
	| { status: 'unloaded' }
	| { status: 'loaded'; indexes: readonly number[] };

export class StorageManager {
	private readonly storage: EncryptedStorage;
	private registry: RegistryState = { status: 'unloaded' };

	private constructor(storage: EncryptedStorage) {
		this.storage = storage;
	}

	/**
	 * Open a manager over the given storage.
	 *
	 * Writes the schema version on first use. If a different version is
	 * already stored, nothing is written and the open fails.
	 *
	 * @throws UnsupportedSchemaVersionError on a version mismatch.
	 * @throws MisuseError if `schemaVersion` is not a single byte.
	 */
	static async open(storage: EncryptedStorage, options: StorageManagerOptions = {}): Promise<StorageManager> {
		const expected = options.schemaVersion ?? DATABASE_SCHEMA_VERSION;
		if (!schemaVersionSchema.safeParse(expected).success) {
			throw new MisuseError(`schema version must be an integer from 0 to 255, got ${expected}`);
		}
		const stored = await storage.tryGet(DATABASE_SCHEMA_VERSION_KEY, schemaVersionSchema);

		if (stored === undefined) {
			log('No schema version found on %s, initializing to %d', storage.id(), expected);
			await storage.set(DATABASE_SCHEMA_VERSION_KEY, expected);
		} else if (stored !== expected) {
			log('Refusing to open %s: schema version %d, expected %d', storage.id(), stored, expected);
			throw new UnsupportedSchemaVersionError(stored, expected);
		}

		return new StorageManager(storage);
	}

	/**
	 * Identifier of the underlying storage engine.
	 */
	id(): string {
		return this.storage.id();
	}

	get isEncrypted(): boolean {
		return this.storage.isEncrypted;
	}

	/**
	 * Read any record by key; undefined if absent.
	 */
	async get<T>(key: string, schema: RecordSchema<T>): Promise<T | undefined> {
		return this.storage.tryGet(key, schema);
	}

	/**
	 * Save the builder options and, where its policy allows, the secret
	 * manager snapshot.
	 *
	 * A persisted snapshot is written in the same batch as the options. Otherwise
	 * any earlier snapshot is removed before the options are written, so a
	 * failed save never pairs new options with an old secret manager.
	 */
	async saveAccountManagerData(builder: AccountManagerBuilder): Promise<void> {
		log('saveAccountManagerData');
		const options = parseAccountManagerOptions(builder.toJSON());

		const secretManager = builder.secretManager;
		if (secretManager && snapshotPolicy(secretManager.kind) === 'persist') {
			await this.storage.batchSet(new Map<string, unknown>([
				[ACCOUNT_MANAGER_INDEXATION_KEY, options],
				[SECRET_MANAGER_KEY, secretManager.toSnapshot()],
			]));
		} else {
			log('Secret manager %s is not persisted', secretManager?.kind ?? 'none');
			await this.storage.remove(SECRET_MANAGER_KEY);
			await this.storage.set(ACCOUNT_MANAGER_INDEXATION_KEY, options);
		}
	}

	/**
	 * Restore the builder saved by saveAccountManagerData().
	 * Resolves undefined if none was saved. A missing snapshot only means
	 * no restorable secret manager was configured.
	 */
	async getAccountManagerData(): Promise<AccountManagerBuilder | undefined> {
		log('getAccountManagerData');
		const options = await this.storage.tryGet(ACCOUNT_MANAGER_INDEXATION_KEY, accountManagerOptionsSchema);
		if (!options) {
			return undefined;
		}

		const builder = new AccountManagerBuilder(options);
		const snapshot = await this.storage.tryGet(SECRET_MANAGER_KEY, secretManagerSnapshotSchema);
		if (snapshot) {
			log('Found %s secret manager snapshot', snapshot.type);
			if (snapshotPolicy(snapshot.type) === 'persist') {
				builder.withSecretManager(secretManagerFromSnapshot(snapshot));
			}
		}
		return builder;
	}

	/**
	 * Registered account indexes, in registration order.
	 */
	async getAccountIndexes(): Promise<number[]> {
		return [...await this.loadRegistry()];
	}

	/**
	 * All registered accounts, in registration order.
	 * @throws InconsistentRegistryError if a registered index has no record.
	 */
	async getAccounts(): Promise<Account[]> {
		const indexes = await this.loadRegistry();
		const accounts: Account[] = [];
		for (const accountIndex of indexes) {
			const account = await this.storage.tryGet(buildAccountKey(accountIndex), accountSchema);
			if (!account) {
				log.extend('error')('Registry lists account %d but its record is missing', accountIndex);
				throw new InconsistentRegistryError(accountIndex);
			}
			accounts.push(account);
		}
		return accounts;
	}

	/**
	 * Insert or replace an account. The registry and the record are written
	 * in one batch, so they commit together.
	 */
	async saveAccount(account: Account): Promise<void> {
		assertAccountIndex(account.index);
		const record = parseAccount(account);
		const indexes = await this.loadRegistry();
		const next = indexes.includes(account.index) ? indexes : [...indexes, account.index];

		log('saveAccount %d', account.index);
		await this.storage.batchSet(new Map<string, unknown>([
			[ACCOUNTS_INDEXATION_KEY, next],
			[buildAccountKey(account.index), record],
		]));
		this.registry = { status: 'loaded', indexes: next };
	}

	/**
	 * Delete an account record, then drop its index from the registry.
	 *
	 * The two writes are separate. If the second fails, the registry still
	 * lists the index and getAccounts() reports InconsistentRegistryError;
	 * calling removeAccount() again completes the removal.
	 */
	async removeAccount(accountIndex: number): Promise<void> {
		assertAccountIndex(accountIndex);
		const indexes = await this.loadRegistry();

		log('removeAccount %d', accountIndex);
		await this.storage.remove(buildAccountKey(accountIndex));
		const next = indexes.filter(i => i !== accountIndex);
		await this.storage.set(ACCOUNTS_INDEXATION_KEY, next);
		this.registry = { status: 'loaded', indexes: next };
	}

	/**
	 * Close the underlying storage. The manager is unusable afterwards.
	 */
	async close(): Promise<void> {
		log('Closing %s', this.storage.id());
		await this.storage.close();
	}

	private async loadRegistry(): Promise<readonly number[]> {
		if (this.registry.status === 'loaded') {
			return this.registry.indexes;
		}
		const indexes = await this.storage.tryGet(ACCOUNTS_INDEXATION_KEY, accountIndexesSchema) ?? [];
		log('Loaded account registry: %o', indexes);
		this.registry = { status: 'loaded', indexes };
		return indexes;
	}
}
