/**
 * Tests for StorageManagerHandle and openStorageManager().
 */

import { expect } from 'chai';
import { setTimeout as delay } from 'node:timers/promises';
import { MemoryStorageAdapter } from '../src/common/memory-adapter.js';
import { MisuseError, StorageError, UnsupportedSchemaVersionError } from '../src/common/errors.js';
import { openStorageManager, type StorageManagerHandle } from '../src/manager/handle.js';
import { DATABASE_SCHEMA_VERSION_KEY } from '../src/manager/keys.js';

describe('StorageManagerHandle', () => {
	let handle: StorageManagerHandle;

	beforeEach(async () => {
		handle = await openStorageManager({ adapter: new MemoryStorageAdapter() });
	});

	afterEach(async () => {
		await handle.close();
	});

	it('runs operations one at a time in call order', async () => {
		const events: string[] = [];
		const first = handle.run(async () => {
			events.push('start 1');
			await delay(20);
			events.push('end 1');
		});
		const second = handle.run(async () => {
			events.push('start 2');
			events.push('end 2');
		});
		await Promise.all([first, second]);
		expect(events).to.deep.equal(['start 1', 'end 1', 'start 2', 'end 2']);
	});

	it('resolves with the operation result', async () => {
		await handle.run(manager => manager.saveAccount({ index: 0, alias: 'main', coinType: 4218, addresses: [] }));
		expect(await handle.run(manager => manager.getAccountIndexes())).to.deep.equal([0]);
	});

	it('keeps going after an operation rejects', async () => {
		const failed = handle.run(async () => {
			throw new Error('boom');
		});
		const next = handle.run(manager => manager.getAccountIndexes());

		try {
			await failed;
			expect.fail('should have thrown');
		} catch (err) {
			expect((err as Error).message).to.equal('boom');
		}
		expect(await next).to.deep.equal([]);
	});

	it('keeps going after an operation throws synchronously', async () => {
		try {
			await handle.run(() => {
				throw new Error('sync boom');
			});
			expect.fail('should have thrown');
		} catch (err) {
			expect((err as Error).message).to.equal('sync boom');
		}
		expect(await handle.run(manager => manager.getAccounts())).to.deep.equal([]);
	});

	it('finishes queued operations before closing', async () => {
		const saved = handle.run(async manager => {
			await delay(10);
			await manager.saveAccount({ index: 1, alias: 'late', coinType: 4218, addresses: [] });
			return manager.getAccountIndexes();
		});
		await handle.close();
		expect(await saved).to.deep.equal([1]);
	});

	it('rejects operations once closed', async () => {
		await handle.close();
		expect(handle.isClosed).to.equal(true);
		try {
			await handle.run(manager => manager.getAccounts());
			expect.fail('should have thrown');
		} catch (err) {
			expect(err).to.be.instanceOf(MisuseError);
			expect((err as Error).message).to.equal('storage manager handle is closed');
		}
	});

	it('a repeated close waits for the manager to close', async () => {
		const adapter = new MemoryStorageAdapter();
		const own = await openStorageManager({ adapter });
		const pending = own.run(() => delay(10));

		const first = own.close();
		await own.close();
		try {
			await adapter.get(DATABASE_SCHEMA_VERSION_KEY);
			expect.fail('should have thrown');
		} catch (err) {
			expect(err).to.be.instanceOf(StorageError);
			expect((err as Error).message).to.equal('MemoryStorageAdapter is closed');
		}
		await Promise.all([first, pending]);
	});

	it('close is idempotent', async () => {
		await handle.close();
		await handle.close();
		expect(handle.isClosed).to.equal(true);
	});
});

describe('openStorageManager', () => {
	it('closes the adapter when the schema gate fails', async () => {
		const adapter = new MemoryStorageAdapter();
		await adapter.set(DATABASE_SCHEMA_VERSION_KEY, '2');

		try {
			await openStorageManager({ adapter });
			expect.fail('should have thrown');
		} catch (err) {
			expect(err).to.be.instanceOf(UnsupportedSchemaVersionError);
		}

		try {
			await adapter.get(DATABASE_SCHEMA_VERSION_KEY);
			expect.fail('should have thrown');
		} catch (err) {
			expect(err).to.be.instanceOf(StorageError);
		}
	});

	it('opens an encrypted manager', async () => {
		const adapter = new MemoryStorageAdapter();
		const handle = await openStorageManager({ adapter, encryptionKey: new Uint8Array(32).fill(5) });
		expect(await handle.run(async manager => manager.isEncrypted)).to.equal(true);
		expect(adapter.peek(DATABASE_SCHEMA_VERSION_KEY)).to.not.equal('1');
		await handle.close();
	});

	it('honours an explicit schema version', async () => {
		const adapter = new MemoryStorageAdapter();
		const handle = await openStorageManager({ adapter, schemaVersion: 7 });
		expect(adapter.peek(DATABASE_SCHEMA_VERSION_KEY)).to.equal('7');
		await handle.close();
	});
});
