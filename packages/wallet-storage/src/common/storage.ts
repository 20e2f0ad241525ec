/**
 * EncryptedStorage - the only path from wallet code to a StorageAdapter.
 *
 * Values are JSON-encoded and, when a key is configured, sealed with
 * encryptRecord() before they reach the adapter. Reads reverse both steps
 * and validate the decoded value against a zod schema.
 */

import type { z } from 'zod';
import type { StorageAdapter } from './adapter.js';
import { assertEncryptionKey, decryptRecord, encryptRecord } from './cipher.js';
import { RecordNotFoundError, SerializationError, toStorageError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('storage');

/**
 * Schema used to decode a stored value into T.
 */
export type RecordSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export class EncryptedStorage {
	private readonly adapter: StorageAdapter;
	private readonly encryptionKey: Uint8Array | undefined;

	/**
	 * @param adapter The engine every read and write goes through.
	 * @param encryptionKey Optional 32-byte key. Copied; the caller may wipe its buffer.
	 */
	constructor(adapter: StorageAdapter, encryptionKey?: Uint8Array) {
		if (encryptionKey) {
			assertEncryptionKey(encryptionKey);
		}
		this.adapter = adapter;
		this.encryptionKey = encryptionKey ? new Uint8Array(encryptionKey) : undefined;
	}

	id(): string {
		return this.adapter.id();
	}

	get isEncrypted(): boolean {
		return this.encryptionKey !== undefined;
	}

	/**
	 * Read the raw record text, decrypted if a key is configured.
	 * @throws RecordNotFoundError if the key is absent.
	 */
	async getRecord(key: string): Promise<string> {
		const stored = await this.call(() => this.adapter.get(key));
		return this.encryptionKey ? decryptRecord(stored, this.encryptionKey) : stored;
	}

	/**
	 * Write raw record text, encrypted if a key is configured.
	 */
	async setRecord(key: string, record: string): Promise<void> {
		const sealed = this.seal(record);
		await this.call(() => this.adapter.set(key, sealed));
	}

	/**
	 * Read and decode a record.
	 * @throws RecordNotFoundError if the key is absent.
	 * @throws SerializationError if the value does not match the schema.
	 */
	async get<T>(key: string, schema: RecordSchema<T>): Promise<T> {
		const record = await this.getRecord(key);
		return decodeRecord(key, record, schema);
	}

	/**
	 * Like get(), but resolves undefined for an absent key.
	 */
	async tryGet<T>(key: string, schema: RecordSchema<T>): Promise<T | undefined> {
		try {
			return await this.get(key, schema);
		} catch (err) {
			if (err instanceof RecordNotFoundError) {
				return undefined;
			}
			throw err;
		}
	}

	/**
	 * Encode and write a record.
	 */
	async set(key: string, value: unknown): Promise<void> {
		log('set %s', key);
		await this.setRecord(key, encodeRecord(key, value));
	}

	/**
	 * Encode, seal and write several records as one atomic batch.
	 */
	async batchSet(values: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>): Promise<void> {
		const sealed = new Map<string, string>();
		for (const [key, value] of valueEntries(values)) {
			sealed.set(key, this.seal(encodeRecord(key, value)));
		}
		log('batchSet %o', Array.from(sealed.keys()));
		await this.call(() => this.adapter.batchSet(sealed));
	}

	async remove(key: string): Promise<void> {
		log('remove %s', key);
		await this.call(() => this.adapter.remove(key));
	}

	async close(): Promise<void> {
		await this.call(() => this.adapter.close());
	}

	private seal(record: string): string {
		return this.encryptionKey ? encryptRecord(record, this.encryptionKey) : record;
	}

	/**
	 * Run an adapter call, wrapping anything outside the error taxonomy.
	 */
	private async call<T>(operation: () => Promise<T>): Promise<T> {
		try {
			return await operation();
		} catch (err) {
			throw toStorageError(err);
		}
	}
}

function valueEntries(values: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>): Array<[string, unknown]> {
	if (isValueMap(values)) {
		return Array.from(values.entries());
	}
	return Object.entries(values);
}

function isValueMap(values: ReadonlyMap<string, unknown> | Readonly<Record<string, unknown>>): values is ReadonlyMap<string, unknown> {
	return values instanceof Map;
}

function encodeRecord(key: string, value: unknown): string {
	const record = JSON.stringify(value);
	if (record === undefined) {
		throw new SerializationError(key, 'value is not JSON-serializable');
	}
	return record;
}

function decodeRecord<T>(key: string, record: string, schema: RecordSchema<T>): T {
	let parsed: unknown;
	try {
		parsed = JSON.parse(record);
	} catch (err) {
		throw new SerializationError(key, 'not valid JSON', err);
	}

	const result = schema.safeParse(parsed);
	if (!result.success) {
		throw new SerializationError(key, result.error.issues.map(i => `${i.path.join('.') || '<root>'}: ${i.message}`).join('; '), result.error);
	}
	return result.data;
}
