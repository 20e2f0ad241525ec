/**
 * Account manager builder: the wallet-level settings that are restored on
 * the next session, plus an optional live secret manager.
 */

import { z } from 'zod';
import { STORAGE_KINDS, DEFAULT_STORAGE_KIND, DEFAULT_STORAGE_PATH, type StorageKind } from '../common/adapter.js';
import { MisuseError } from '../common/errors.js';
import { formatIssues, u32Schema } from './account.js';
import type { SecretManager } from './secret-manager.js';

const storageKindSchema = z.custom<StorageKind>(
	value => typeof value === 'string' && STORAGE_KINDS.some(kind => kind === value),
	{ message: `storage kind must be one of ${STORAGE_KINDS.join(', ')}` }
);

export const accountManagerOptionsSchema = z.object({
	coinType: u32Schema,
	clientOptions: z.object({
		nodes: z.array(z.string().url()),
		localPow: z.boolean(),
	}).optional(),
	storageOptions: z.object({
		kind: storageKindSchema,
		storagePath: z.string().min(1),
	}),
});

export type AccountManagerOptions = z.infer<typeof accountManagerOptionsSchema>;

/** Coin type used when none is given (SLIP-44 4218). */
export const DEFAULT_COIN_TYPE = 4218;

/**
 * Validate options before they are stored; the read path applies the same schema.
 * @throws MisuseError listing the invalid fields.
 */
export function parseAccountManagerOptions(options: unknown): AccountManagerOptions {
	const result = accountManagerOptionsSchema.safeParse(options);
	if (!result.success) {
		throw new MisuseError(`invalid account manager options: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export class AccountManagerBuilder {
	readonly options: AccountManagerOptions;
	secretManager?: SecretManager;

	/**
	 * @throws MisuseError if the options would not load back from storage.
	 */
	constructor(options: Partial<AccountManagerOptions> = {}, secretManager?: SecretManager) {
		this.options = parseAccountManagerOptions({
			coinType: options.coinType ?? DEFAULT_COIN_TYPE,
			storageOptions: options.storageOptions ?? { kind: DEFAULT_STORAGE_KIND, storagePath: DEFAULT_STORAGE_PATH },
			...(options.clientOptions ? { clientOptions: options.clientOptions } : {}),
		});
		this.secretManager = secretManager;
	}

	withSecretManager(secretManager: SecretManager | undefined): this {
		this.secretManager = secretManager;
		return this;
	}

	/**
	 * Only the options are serialized; the secret manager is stored separately
	 * under its own snapshot policy.
	 */
	toJSON(): AccountManagerOptions {
		return this.options;
	}
}
