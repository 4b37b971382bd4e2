import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { types } from 'cassandra-driver';
import { FileCheckpointStore } from '../file';
import { MemoryCheckpointStore } from '../memory';
import { CassandraCheckpointStore } from '../cassandra';
import { fakeSession } from '../../adapters/__tests__/fakeSession';

describe('FileCheckpointStore', () => {
	let dir = '';
	beforeEach(async () => { dir = await fs.mkdtemp(join(tmpdir(), 'ckpt-')); });
	afterEach(async () => { await fs.rm(dir, { recursive: true, force: true }); });

	it('reads a missing file as zero', async () => {
		expect(await new FileCheckpointStore(join(dir, 'checkpoint.txt')).load()).toBe(0);
	});

	it('saves and loads, creating parent directories', async () => {
		const path = join(dir, 'nested', 'checkpoint.txt');
		const store = new FileCheckpointStore(path);

		await store.save(1700000000);

		expect(await store.load()).toBe(1700000000);
		expect(await fs.readFile(path, 'utf8')).toBe('1700000000');
		expect(await fs.readdir(join(dir, 'nested'))).toEqual(['checkpoint.txt']);
	});

	it('tolerates surrounding whitespace', async () => {
		const path = join(dir, 'checkpoint.txt');
		await fs.writeFile(path, ' 42\n', 'utf8');
		expect(await new FileCheckpointStore(path).load()).toBe(42);
	});

	it('resets to zero', async () => {
		const store = new FileCheckpointStore(join(dir, 'checkpoint.txt'));
		await store.save(10);
		await store.reset();
		expect(await store.load()).toBe(0);
	});

	it('refuses a file that does not hold an integer', async () => {
		const path = join(dir, 'checkpoint.txt');
		await fs.writeFile(path, 'yesterday', 'utf8');
		await expect(new FileCheckpointStore(path).load()).rejects.toMatchObject({
			code: 'CHECKPOINT_CORRUPT',
			message: `Checkpoint file ${path} does not hold an integer`,
		});
	});

	it('refuses negative and fractional watermarks', async () => {
		const store = new FileCheckpointStore(join(dir, 'checkpoint.txt'));
		await expect(store.save(-1)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT', message: 'Checkpoint must be a non-negative integer, got -1' });
		await expect(store.save(1.5)).rejects.toMatchObject({ code: 'INVALID_ARGUMENT' });
		expect(await fs.readdir(dir)).toEqual([]);
	});
});

describe('MemoryCheckpointStore', () => {
	it('starts from the initial value and resets to zero', async () => {
		const store = new MemoryCheckpointStore(7);
		expect(await store.load()).toBe(7);
		await store.save(9);
		expect(await store.load()).toBe(9);
		await store.reset();
		expect(await store.load()).toBe(0);
	});

	it('refuses an invalid initial value', () => {
		expect(() => new MemoryCheckpointStore(-5)).toThrow('Checkpoint must be a non-negative integer, got -5');
	});
});

describe('CassandraCheckpointStore', () => {
	it('creates its table', async () => {
		const fake = fakeSession();
		await new CassandraCheckpointStore(fake.session, { table: 'sync_checkpoints', name: 'w1' }).ensureTable();
		expect(fake.executes[0]?.query).toBe('CREATE TABLE IF NOT EXISTS sync_checkpoints (name text PRIMARY KEY, watermark bigint)');
	});

	it('loads zero when no row exists', async () => {
		const fake = fakeSession();
		const store = new CassandraCheckpointStore(fake.session, { table: 'sync_checkpoints', name: 'w1' });

		expect(await store.load()).toBe(0);
		expect(fake.executes).toEqual([{
			query: 'SELECT watermark FROM sync_checkpoints WHERE name = ?',
			params: ['w1'],
			options: { consistency: 'quorum' },
		}]);
	});

	it('loads a bigint watermark', async () => {
		const fake = fakeSession(() => [{ watermark: types.Long.fromNumber(1700000000) }]);
		expect(await new CassandraCheckpointStore(fake.session, { table: 't', name: 'w1' }).load()).toBe(1700000000);
	});

	it('treats a null watermark as zero', async () => {
		const fake = fakeSession(() => [{ watermark: null }]);
		expect(await new CassandraCheckpointStore(fake.session, { table: 't', name: 'w1' }).load()).toBe(0);
	});

	it('refuses a watermark that is not an integer', async () => {
		const fake = fakeSession(() => [{ watermark: 'soon' }]);
		await expect(new CassandraCheckpointStore(fake.session, { table: 't', name: 'w1' }).load()).rejects.toMatchObject({
			code: 'CHECKPOINT_CORRUPT',
			message: 'Checkpoint row w1 in t does not hold an integer',
		});
	});

	it('saves at quorum as a long', async () => {
		const fake = fakeSession();
		await new CassandraCheckpointStore(fake.session, { table: 't', name: 'w1' }).save(1234);

		const [call] = fake.executes;
		expect(call?.query).toBe('INSERT INTO t (name, watermark) VALUES (?, ?)');
		expect(call?.params[0]).toBe('w1');
		expect(String(call?.params[1])).toBe('1234');
		expect(call?.options).toEqual({ consistency: 'quorum' });
	});

	it('refuses a table name that is not an identifier', () => {
		expect(() => new CassandraCheckpointStore(fakeSession().session, { table: 'a-b', name: 'w1' })).toThrow('Invalid CQL table name: a-b');
	});
});
