/**
 * Tests for EncryptedStorage.
 */

import { expect } from 'chai';
import { z } from 'zod';
import { EncryptedStorage } from '../src/common/storage.js';
import { MemoryStorageAdapter } from '../src/common/memory-adapter.js';
import {
	DecryptionError,
	MisuseError,
	RecordNotFoundError,
	SerializationError,
	StorageError,
	StorageErrorCode,
} from '../src/common/errors.js';
import type { RecordBatch, StorageAdapter } from '../src/common/adapter.js';

const KEY = new Uint8Array(32).fill(1);
const noteSchema = z.object({ title: z.string(), pinned: z.boolean() });

/** Adapter whose every operation fails with a plain engine error. */
class FailingAdapter implements StorageAdapter {
	id(): string { return 'failing'; }
	async get(_key: string): Promise<string> { throw new Error('disk unplugged'); }
	async set(_key: string, _value: string): Promise<void> { throw new Error('disk unplugged'); }
	async batchSet(_records: RecordBatch): Promise<void> { throw new Error('disk unplugged'); }
	async remove(_key: string): Promise<void> { throw new Error('disk unplugged'); }
	async close(): Promise<void> {}
}

describe('EncryptedStorage', () => {
	let adapter: MemoryStorageAdapter;

	beforeEach(() => {
		adapter = new MemoryStorageAdapter();
	});

	describe('without a key', () => {
		let storage: EncryptedStorage;

		beforeEach(() => {
			storage = new EncryptedStorage(adapter);
		});

		it('stores values as plain JSON', async () => {
			await storage.set('note', { title: 'groceries', pinned: false });
			expect(adapter.peek('note')).to.equal('{"title":"groceries","pinned":false}');
			expect(storage.isEncrypted).to.equal(false);
		});

		it('decodes and validates on read', async () => {
			await storage.set('note', { title: 'groceries', pinned: true });
			expect(await storage.get('note', noteSchema)).to.deep.equal({ title: 'groceries', pinned: true });
		});

		it('get rejects an absent key; tryGet resolves undefined', async () => {
			try {
				await storage.get('note', noteSchema);
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(RecordNotFoundError);
			}
			expect(await storage.tryGet('note', noteSchema)).to.equal(undefined);
		});

		it('reports a value of the wrong shape', async () => {
			await storage.set('note', { title: 7 });
			try {
				await storage.get('note', noteSchema);
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(SerializationError);
				expect((err as SerializationError).code).to.equal(StorageErrorCode.FORMAT);
				expect((err as Error).message).to.match(/^invalid record note: title: /);
			}
		});

		it('reports a value that is not JSON', async () => {
			await adapter.set('note', 'not json');
			try {
				await storage.get('note', noteSchema);
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(SerializationError);
				expect((err as Error).message).to.equal('invalid record note: not valid JSON');
			}
		});

		it('refuses a value JSON cannot encode', async () => {
			try {
				await storage.set('note', undefined);
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(SerializationError);
			}
			expect(adapter.size).to.equal(0);
		});

		it('tryGet still surfaces errors other than not-found', async () => {
			await adapter.set('note', 'not json');
			try {
				await storage.tryGet('note', noteSchema);
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(SerializationError);
			}
		});

		it('remove deletes the record', async () => {
			await storage.set('note', { title: 'x', pinned: false });
			await storage.remove('note');
			expect(await storage.tryGet('note', noteSchema)).to.equal(undefined);
		});

		it('reports the adapter id', () => {
			expect(storage.id()).to.equal('memory');
		});
	});

	describe('with a key', () => {
		let storage: EncryptedStorage;

		beforeEach(() => {
			storage = new EncryptedStorage(adapter, KEY);
		});

		it('never hands plaintext to the adapter', async () => {
			await storage.set('secret', 'test-secret');
			const raw = adapter.peek('secret');
			expect(raw).to.be.a('string');
			expect(raw).to.not.equal('"test-secret"');
			expect(await storage.get('secret', z.string())).to.equal('test-secret');
			expect(storage.isEncrypted).to.equal(true);
		});

		it('round-trips raw record text', async () => {
			await storage.setRecord('raw', 'hello');
			expect(adapter.peek('raw')).to.not.equal('hello');
			expect(await storage.getRecord('raw')).to.equal('hello');
		});

		it('fails with DecryptionError under a different key', async () => {
			await storage.set('secret', 'test-secret');
			const other = new EncryptedStorage(adapter, new Uint8Array(32).fill(2));
			try {
				await other.get('secret', z.string());
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(DecryptionError);
			}
		});

		it('fails with DecryptionError on a plaintext record', async () => {
			await adapter.set('secret', '"test-secret"');
			try {
				await storage.get('secret', z.string());
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(DecryptionError);
			}
		});

		it('copies the key so the caller may wipe it', async () => {
			const key = new Uint8Array(32).fill(3);
			const keyed = new EncryptedStorage(adapter, key);
			await keyed.set('n', 1);
			key.fill(0);
			expect(await keyed.get('n', z.number())).to.equal(1);
		});

		it('rejects a key of the wrong length', () => {
			expect(() => new EncryptedStorage(adapter, new Uint8Array(31))).to.throw(MisuseError);
		});
	});

	describe('batchSet', () => {
		it('seals every entry and writes them together', async () => {
			const storage = new EncryptedStorage(adapter, KEY);
			await storage.batchSet(new Map<string, unknown>([['a', 1], ['b', [2, 3]]]));
			expect(adapter.size).to.equal(2);
			expect(adapter.peek('a')).to.not.equal('1');
			expect(await storage.get('a', z.number())).to.equal(1);
			expect(await storage.get('b', z.array(z.number()))).to.deep.equal([2, 3]);
		});

		it('accepts a plain object', async () => {
			const storage = new EncryptedStorage(adapter);
			await storage.batchSet({ a: 'x', b: true });
			expect(adapter.peek('a')).to.equal('"x"');
			expect(adapter.peek('b')).to.equal('true');
		});

		it('writes nothing if one value cannot be encoded', async () => {
			const storage = new EncryptedStorage(adapter);
			try {
				await storage.batchSet({ a: 1, b: undefined });
				expect.fail('should have thrown');
			} catch (err) {
				expect(err).to.be.instanceOf(SerializationError);
			}
			expect(adapter.size).to.equal(0);
		});
	});

	describe('engine failures', () => {
		it('wraps them as StorageError with the engine message', async () => {
			const storage = new EncryptedStorage(new FailingAdapter());
			for (const operation of [
				() => storage.get('k', z.string()),
				() => storage.set('k', 'v'),
				() => storage.batchSet({ k: 'v' }),
				() => storage.remove('k'),
			]) {
				try {
					await operation();
					expect.fail('should have thrown');
				} catch (err) {
					expect(err).to.be.instanceOf(StorageError);
					expect((err as StorageError).message).to.equal('disk unplugged');
					expect((err as StorageError).cause).to.be.instanceOf(Error);
				}
			}
		});
	});
});
