/**
 * Reserved record keys.
 *
 *   database-schema-version   - schema version (single byte)
 *   wallet-accounts           - account index registry
 *   wallet-account-{index}    - one account record per registered index
 *   wallet-account-manager    - account manager options
 *   secret-manager            - secret manager snapshot (never the mnemonic variant)
 */

import { z } from 'zod';

/** Schema version written by, and required by, this release. */
export const DATABASE_SCHEMA_VERSION = 1;

/** A schema version is a single byte. */
export const schemaVersionSchema = z.number().int().min(0).max(255);

export const DATABASE_SCHEMA_VERSION_KEY = 'database-schema-version';
export const ACCOUNTS_INDEXATION_KEY = 'wallet-accounts';
export const ACCOUNT_INDEXATION_KEY = 'wallet-account-';
export const ACCOUNT_MANAGER_INDEXATION_KEY = 'wallet-account-manager';
export const SECRET_MANAGER_KEY = 'secret-manager';

/**
 * Build the record key for an account index.
 */
export function buildAccountKey(accountIndex: number): string {
	return `${ACCOUNT_INDEXATION_KEY}${accountIndex}`;
}
