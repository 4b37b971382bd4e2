import type { ColumnRow, ColumnStoreAdapter, PreparedQuery, RecordHooks, RecordScanner, SearchIndexAdapter, SyncRecord, VersionWindow } from './types';
import { inWindow } from './types';
import type { FieldLayout, RecordCodec } from './codec';
import { replicatedFields } from './config';

/**
 * Reads the search index. A window is pushed down to the index as a range filter.
 */
export class SearchIndexScanner implements RecordScanner {
	constructor(
		private readonly index: SearchIndexAdapter,
		private readonly codec: RecordCodec<unknown, Record<string, unknown>>,
		private readonly layout: FieldLayout,
	) {}

	async *scan(window?: VersionWindow, hooks?: RecordHooks): AsyncGenerator<SyncRecord> {
		const hits = this.index.scan({ fields: replicatedFields(this.layout), versionField: this.layout.versionField, range: window });
		for await (const source of hits) {
			const decoded = this.codec.decode(source);
			if (decoded.ok) yield decoded.value;
			else hooks?.rejected?.(decoded.error);
		}
	}
}

/**
 * Reads the whole column store table. The table has no range-filterable scan on
 * the version column, so every row is read and the window is applied here.
 */
export class ColumnStoreScanner implements RecordScanner {
	private readonly select: PreparedQuery;

	constructor(
		private readonly store: ColumnStoreAdapter,
		private readonly codec: RecordCodec<ColumnRow>,
		layout: FieldLayout,
	) {
		this.select = store.prepare('select-all', replicatedFields(layout));
	}

	async *scan(window?: VersionWindow, hooks?: RecordHooks): AsyncGenerator<SyncRecord> {
		for await (const row of this.store.scanAll(this.select)) {
			const decoded = this.codec.decode(row);
			if (!decoded.ok) hooks?.rejected?.(decoded.error);
			else if (inWindow(decoded.value.version, window)) yield decoded.value;
			else hooks?.discarded?.(decoded.value);
		}
	}
}
