import { describe, it, expect } from 'vitest';
import { ColumnStoreScanner, SearchIndexScanner } from '../scanner';
import { columnRowCodec, searchDocumentCodec, textIdentifiers, type FieldLayout } from '../codec';
import { replicatedFields } from '../config';
import { MemoryColumnStore, MemorySearchIndex } from '../adapters/memory';
import type { RecordHooks, RecordScanner, SyncRecord, VersionWindow } from '../types';

const layout: FieldLayout = { idField: 'id', versionField: 'version', syncFields: ['f'] };

async function collect(scanner: RecordScanner, window?: VersionWindow) {
	const records: SyncRecord[] = [];
	const rejected: string[] = [];
	const discarded: string[] = [];
	const hooks: RecordHooks = { rejected: (reason) => rejected.push(reason), discarded: (record) => discarded.push(record.id) };
	for await (const record of scanner.scan(window, hooks)) records.push(record);
	return { ids: records.map((r) => r.id), rejected, discarded };
}

async function columnScanner(rows: Array<{ id: string; version: number | null }>): Promise<RecordScanner> {
	const store = new MemoryColumnStore();
	await store.executeBatch(
		store.prepare('upsert-with-timestamp', ['id', 'version']),
		rows.map((values) => ({ values, writeTime: 1 })),
		{ atomic: true },
	);
	return new ColumnStoreScanner(store, columnRowCodec(layout, textIdentifiers), layout);
}

describe('replicatedFields', () => {
	it('takes a layout with read-only sync fields', () => {
		expect(replicatedFields(layout)).toEqual(['id', 'version', 'f']);
	});
});

describe('ColumnStoreScanner', () => {
	it('reads every row without a window', async () => {
		const scanner = await columnScanner([{ id: 'a', version: 1 }, { id: 'b', version: 9 }]);
		expect(await collect(scanner)).toEqual({ ids: ['a', 'b'], rejected: [], discarded: [] });
	});

	it('drops rows outside the window and reports each one', async () => {
		const scanner = await columnScanner([{ id: 'a', version: 4 }, { id: 'b', version: 5 }, { id: 'c', version: 9 }, { id: 'd', version: 10 }]);
		expect(await collect(scanner, { from: 5, to: 9 })).toEqual({ ids: ['b', 'c'], rejected: [], discarded: ['a', 'd'] });
	});

	it('reports rows without a version as rejected', async () => {
		const scanner = await columnScanner([{ id: 'a', version: null }, { id: 'b', version: 2 }]);
		expect(await collect(scanner)).toEqual({ ids: ['b'], rejected: ['record a has no integer version'], discarded: [] });
	});
});

describe('SearchIndexScanner', () => {
	it('leaves window filtering to the index', async () => {
		const index = new MemorySearchIndex();
		await index.bulkWrite([4, 5, 9, 10].map((v) => ({ id: `d${v}`, version: v, source: { id: `d${v}`, version: v } })), { versioned: true });
		const scanner = new SearchIndexScanner(index, searchDocumentCodec(layout), layout);

		expect(await collect(scanner, { from: 5, to: 9 })).toEqual({ ids: ['d5', 'd9'], rejected: [], discarded: [] });
	});
});
