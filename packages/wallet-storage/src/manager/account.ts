/**
 * Persisted account record.
 *
 * Account behaviour (syncing, signing, balance) lives in the wallet; this
 * module only fixes the stored shape so records can be validated on read.
 */

import { z } from 'zod';
import { MisuseError } from '../common/errors.js';

const MAX_U32 = 0xffffffff;

export const u32Schema = z.number().int().min(0).max(MAX_U32);

export const accountAddressSchema = z.object({
	address: z.string().min(1),
	keyIndex: u32Schema,
	internal: z.boolean(),
	used: z.boolean(),
});

export const accountSchema = z.object({
	index: u32Schema,
	alias: z.string(),
	coinType: u32Schema,
	addresses: z.array(accountAddressSchema),
});

/** Ordered, duplicate-free list of account indexes. */
export const accountIndexesSchema = z.array(u32Schema).refine(
	indexes => new Set(indexes).size === indexes.length,
	{ message: 'account indexes must be unique' }
);

export type AccountAddress = z.infer<typeof accountAddressSchema>;
export type Account = z.infer<typeof accountSchema>;

/**
 * Throw unless the value is a valid u32 account index.
 */
export function assertAccountIndex(accountIndex: number): void {
	if (!u32Schema.safeParse(accountIndex).success) {
		throw new MisuseError(`account index must be an unsigned 32-bit integer, got ${accountIndex}`);
	}
}

/**
 * Validate an account before it is written, so that one bad record cannot
 * make every later getAccounts() fail.
 * @throws MisuseError listing the invalid fields.
 */
export function parseAccount(account: Account): Account {
	const result = accountSchema.safeParse(account);
	if (!result.success) {
		throw new MisuseError(`invalid account ${account.index}: ${formatIssues(result.error)}`);
	}
	return result.data;
}

export function formatIssues(error: z.ZodError): string {
	return error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; ');
}
