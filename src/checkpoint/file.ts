import { promises as fs } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import type { CheckpointStore } from '../types';
import { SyncError } from '../shared/errors';
import { assertWatermark } from './validate';

export const DEFAULT_CHECKPOINT_FILE = 'checkpoint.txt';

function isMissing(e: unknown): boolean {
	return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Checkpoint kept in a local text file holding a single integer.
 * Saves write a sibling temp file and rename it over the target, so readers never see a partial value.
 * Not shared between machines; use CassandraCheckpointStore for that.
 */
export class FileCheckpointStore implements CheckpointStore {
	readonly path: string;

	constructor(path: string = DEFAULT_CHECKPOINT_FILE) {
		this.path = path;
	}

	async load(): Promise<number> {
		let text: string;
		try {
			text = await fs.readFile(this.path, 'utf8');
		} catch (e) {
			if (isMissing(e)) return 0;
			throw e;
		}
		const trimmed = text.trim();
		const value = /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
		if (!Number.isSafeInteger(value)) {
			throw new SyncError('CHECKPOINT_CORRUPT', `Checkpoint file ${this.path} does not hold an integer`, { path: this.path, content: trimmed.slice(0, 64) });
		}
		return value;
	}

	async save(watermark: number): Promise<void> {
		assertWatermark(watermark);
		const dir = dirname(this.path);
		const tmp = join(dir, `.${basename(this.path)}.${process.pid}.tmp`);
		await fs.mkdir(dir, { recursive: true });
		await fs.writeFile(tmp, String(watermark), 'utf8');
		try {
			await fs.rename(tmp, this.path);
		} catch (e) {
			await fs.rm(tmp, { force: true });
			throw e;
		}
	}

	async reset(): Promise<void> {
		await this.save(0);
	}
}
