/**
 * Secret managers and their persisted snapshots.
 *
 * Key derivation and signing are outside this package; these classes carry
 * only what the storage layer needs: a variant tag and a snapshot that can
 * (or deliberately cannot) rebuild the secret manager.
 */

import { z } from 'zod';
import { SecretManagerError } from '../common/errors.js';

export const secretManagerSnapshotSchema = z.discriminatedUnion('type', [
	z.object({
		type: z.literal('stronghold'),
		snapshotPath: z.string().min(1),
		timeoutMs: z.number().int().positive().optional(),
	}),
	z.object({
		type: z.literal('ledgerNano'),
		simulator: z.boolean(),
	}),
	z.object({
		type: z.literal('mnemonic'),
	}),
	z.object({
		type: z.literal('placeholder'),
	}),
]);

export type SecretManagerSnapshot = z.infer<typeof secretManagerSnapshotSchema>;
export type SecretManagerKind = SecretManagerSnapshot['type'];

/**
 * Whether a variant's snapshot may be written to storage.
 *   persist - written on save, rebuilt on load
 *   never   - not written; nothing is rebuilt on load
 */
export type SnapshotPolicy = 'persist' | 'never';

/**
 * One entry per variant. A new variant does not compile until it is given a policy.
 * A mnemonic secret manager holds a seed that its snapshot cannot carry, so
 * restoring it from storage would produce a different wallet.
 */
export const SECRET_MANAGER_SNAPSHOT_POLICY = {
	stronghold: 'persist',
	ledgerNano: 'persist',
	mnemonic: 'never',
	placeholder: 'persist',
} as const satisfies Record<SecretManagerKind, SnapshotPolicy>;

export function snapshotPolicy(kind: SecretManagerKind): SnapshotPolicy {
	return SECRET_MANAGER_SNAPSHOT_POLICY[kind];
}

export interface SecretManager {
	readonly kind: SecretManagerKind;
	toSnapshot(): SecretManagerSnapshot;
}

/**
 * Stronghold vault on disk. The vault password is never part of the snapshot.
 */
export class StrongholdSecretManager implements SecretManager {
	readonly kind = 'stronghold';

	constructor(
		readonly snapshotPath: string,
		readonly timeoutMs?: number,
	) {}

	toSnapshot(): SecretManagerSnapshot {
		return this.timeoutMs === undefined
			? { type: 'stronghold', snapshotPath: this.snapshotPath }
			: { type: 'stronghold', snapshotPath: this.snapshotPath, timeoutMs: this.timeoutMs };
	}
}

export class LedgerNanoSecretManager implements SecretManager {
	readonly kind = 'ledgerNano';

	constructor(readonly simulator: boolean = false) {}

	toSnapshot(): SecretManagerSnapshot {
		return { type: 'ledgerNano', simulator: this.simulator };
	}
}

/**
 * Mnemonic-backed secret manager. The phrase stays in memory; the snapshot
 * only records the variant.
 */
export class MnemonicSecretManager implements SecretManager {
	readonly kind = 'mnemonic';
	private readonly mnemonic: string;

	constructor(mnemonic: string) {
		const words = mnemonic.trim().split(/\s+/);
		if (![12, 15, 18, 21, 24].includes(words.length)) {
			throw new SecretManagerError(`mnemonic must have 12, 15, 18, 21 or 24 words, got ${words.length}`);
		}
		this.mnemonic = words.join(' ');
	}

	get wordCount(): number {
		return this.mnemonic.split(' ').length;
	}

	toSnapshot(): SecretManagerSnapshot {
		return { type: 'mnemonic' };
	}
}

/**
 * Stands in for a secret manager that is not available in this process
 * (e.g. a watch-only wallet).
 */
export class PlaceholderSecretManager implements SecretManager {
	readonly kind = 'placeholder';

	toSnapshot(): SecretManagerSnapshot {
		return { type: 'placeholder' };
	}
}

/**
 * Rebuild a secret manager from its snapshot.
 * @throws SecretManagerError for variants that cannot be rebuilt.
 */
export function secretManagerFromSnapshot(snapshot: SecretManagerSnapshot): SecretManager {
	switch (snapshot.type) {
		case 'stronghold':
			return new StrongholdSecretManager(snapshot.snapshotPath, snapshot.timeoutMs);
		case 'ledgerNano':
			return new LedgerNanoSecretManager(snapshot.simulator);
		case 'placeholder':
			return new PlaceholderSecretManager();
		case 'mnemonic':
			throw new SecretManagerError('a mnemonic secret manager cannot be restored from a snapshot');
	}
}
