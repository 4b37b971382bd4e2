import { types } from 'cassandra-driver';
import type { CheckpointStore } from '../types';
import type { CqlSession } from '../adapters/cassandra';
import { assertIdentifier } from '../adapters/cql';
import { toVersion } from '../codec';
import { SyncError } from '../shared/errors';
import { assertWatermark } from './validate';

/**
 * Checkpoint stored in a Cassandra table, one row per worker name.
 * Reads and writes use QUORUM so any worker sees the latest saved value.
 */
export class CassandraCheckpointStore implements CheckpointStore {
	private readonly session: CqlSession;
	private readonly table: string;
	private readonly name: string;

	constructor(session: CqlSession, options: { table: string; name: string }) {
		this.session = session;
		this.table = assertIdentifier(options.table, 'table name');
		this.name = options.name;
	}

	async ensureTable(): Promise<void> {
		await this.session.execute(`CREATE TABLE IF NOT EXISTS ${this.table} (name text PRIMARY KEY, watermark bigint)`, []);
	}

	async load(): Promise<number> {
		const rows = await this.session.execute(`SELECT watermark FROM ${this.table} WHERE name = ?`, [this.name], { consistency: 'quorum' });
		const first = rows[0];
		if (!first || first.watermark === null || first.watermark === undefined) return 0;
		const value = toVersion(first.watermark);
		if (value === undefined) {
			throw new SyncError('CHECKPOINT_CORRUPT', `Checkpoint row ${this.name} in ${this.table} does not hold an integer`, { name: this.name });
		}
		return value;
	}

	async save(watermark: number): Promise<void> {
		assertWatermark(watermark);
		await this.session.execute(
			`INSERT INTO ${this.table} (name, watermark) VALUES (?, ?)`,
			[this.name, types.Long.fromNumber(watermark)],
			{ consistency: 'quorum' },
		);
	}

	async reset(): Promise<void> {
		await this.save(0);
	}
}
