import type { ColumnRow, ColumnStoreAdapter, IndexDocument, PreparedQuery, RecordHooks, RecordWriter, SearchIndexAdapter, SyncRecord, TimestampedRow, WriteStats } from './types';
import type { FieldLayout, RecordCodec } from './codec';
import type { SyncReporter } from './reporter';
import { replicatedFields } from './config';
import { describeError } from './shared/errors';

/** Versions are unix seconds; the column store stamps cells in microseconds. */
export function writeTimeFor(version: number): number {
	return version * 1_000_000;
}

/**
 * Writes batches to the column store as one atomic batch of timestamped upserts.
 * An older write-time loses to what is stored, cell by cell, inside the store.
 * A failed batch counts every record as failed; nothing is retried here.
 */
export class ColumnStoreWriter implements RecordWriter {
	private readonly upsert: PreparedQuery;

	constructor(
		private readonly store: ColumnStoreAdapter,
		private readonly codec: RecordCodec<ColumnRow>,
		layout: FieldLayout,
		private readonly reporter: SyncReporter,
	) {
		this.upsert = store.prepare('upsert-with-timestamp', replicatedFields(layout));
	}

	async write(batch: readonly SyncRecord[], hooks?: RecordHooks): Promise<WriteStats> {
		const rows: TimestampedRow[] = [];
		for (const record of batch) {
			try {
				rows.push({ values: this.codec.encode(record), writeTime: writeTimeFor(record.version) });
			} catch (e) {
				const reason = describeError(e);
				hooks?.rejected?.(reason);
				this.reporter.on('recordRejected', { direction: 'search-to-column', reason });
			}
		}
		const unencodable = batch.length - rows.length;
		if (rows.length === 0) return { succeeded: 0, skippedOrFailed: batch.length };
		try {
			await this.store.executeBatch(this.upsert, rows, { atomic: true });
		} catch (error) {
			this.reporter.on('batchFailed', { direction: 'search-to-column', size: batch.length, error });
			return { succeeded: 0, skippedOrFailed: batch.length };
		}
		return { succeeded: rows.length, skippedOrFailed: unencodable };
	}
}

/**
 * Writes batches to the search index with external versioning: a document only
 * replaces one whose version is strictly lower. Conflicts are counted, not retried.
 */
export class SearchIndexWriter implements RecordWriter {
	constructor(
		private readonly index: SearchIndexAdapter,
		private readonly codec: RecordCodec<IndexDocument, Record<string, unknown>>,
		private readonly reporter: SyncReporter,
	) {}

	async write(batch: readonly SyncRecord[]): Promise<WriteStats> {
		if (batch.length === 0) return { succeeded: 0, skippedOrFailed: 0 };
		const documents = batch.map((record) => this.codec.encode(record));
		const result = await this.index.bulkWrite(documents, { versioned: true });
		if (result.failed > 0) {
			this.reporter.on('itemErrors', { direction: 'column-to-search', count: result.failed, firstReason: result.firstError ?? 'unknown error' });
		}
		return { succeeded: result.succeeded, skippedOrFailed: result.conflicts + result.failed };
	}
}
