import { Client, type estypes } from '@elastic/elasticsearch';
import type { BulkWriteResult, IndexDocument, SearchIndexAdapter, VersionWindow } from '../types';
import type { SearchIndexConfig } from '../config';
import { SyncError } from '../shared/errors';

/** Query DSL subset the replicator emits. */
export type ScanQueryDsl =
	| { match_all: Record<string, never> }
	| { bool: { filter: Array<{ range: Record<string, { gte: number; lte: number }> }> } };

export interface BulkOperation {
	id: string;
	/** External version; omitted for unversioned writes. */
	version?: number;
	document: Record<string, unknown>;
}

export interface BulkItemResult {
	status: number;
	errorType?: string;
	reason?: string;
}

/** The slice of an Elasticsearch client the replicator uses. */
export interface SearchTransport {
	bulk(index: string, operations: readonly BulkOperation[]): Promise<BulkItemResult[]>;
	/** `_source` of every matching document, scrolled page by page. */
	scroll(request: { index: string; query: ScanQueryDsl; fields: readonly string[]; pageSize: number }): AsyncIterable<Record<string, unknown>>;
	close(): Promise<void>;
}

/** Wrap an @elastic/elasticsearch client. */
export function clientTransport(client: Client): SearchTransport {
	return {
		async bulk(index, operations) {
			const body: Array<estypes.BulkOperationContainer | Record<string, unknown>> = [];
			for (const op of operations) {
				const action: estypes.BulkOperationContainer = op.version === undefined
					? { index: { _id: op.id } }
					: { index: { _id: op.id, version: op.version, version_type: 'external' } };
				body.push(action, op.document);
			}
			const res = await client.bulk<Record<string, unknown>>({ index, operations: body });
			return res.items.map((item) => {
				const r = item.index;
				if (!r) return { status: 500, errorType: 'unexpected_response', reason: 'bulk item without index result' };
				return { status: r.status, errorType: r.error?.type, reason: r.error?.reason ?? undefined };
			});
		},
		scroll(request) {
			return client.helpers.scrollDocuments<Record<string, unknown>>({
				index: request.index,
				query: request.query,
				_source: [...request.fields],
				size: request.pageSize,
			});
		},
		async close() {
			await client.close();
		},
	};
}

export function connectElasticsearch(config: SearchIndexConfig): SearchTransport {
	return clientTransport(new Client({ nodes: config.hosts }));
}

export function scanQuery(versionField: string, range?: VersionWindow): ScanQueryDsl {
	if (!range) return { match_all: {} };
	return { bool: { filter: [{ range: { [versionField]: { gte: range.from, lte: range.to } } }] } };
}

/**
 * Search index binding for one Elasticsearch index.
 * Versioned writes use external versioning; a 409 answer means the index already holds an equal or newer version.
 */
export function elasticsearchIndex(transport: SearchTransport, options: { indexName: string; pageSize: number }): SearchIndexAdapter {
	return {
		async bulkWrite(documents: readonly IndexDocument[], writeOptions): Promise<BulkWriteResult> {
			const result: BulkWriteResult = { succeeded: 0, conflicts: 0, failed: 0 };
			if (documents.length === 0) return result;
			const ops = documents.map((d) => ({ id: d.id, version: writeOptions.versioned ? d.version : undefined, document: d.source }));
			const items = await transport.bulk(options.indexName, ops);
			if (items.length !== documents.length) {
				throw new SyncError('STORE_UNAVAILABLE', `Bulk response has ${items.length} items for ${documents.length} documents`, { index: options.indexName });
			}
			for (const item of items) {
				if (item.status >= 200 && item.status < 300) result.succeeded += 1;
				else if (item.status === 409) result.conflicts += 1;
				else {
					result.failed += 1;
					result.firstError ??= `${item.errorType ?? `status ${item.status}`}: ${item.reason ?? 'no reason given'}`;
				}
			}
			return result;
		},
		scan(query) {
			return transport.scroll({
				index: options.indexName,
				query: scanQuery(query.versionField, query.range),
				fields: query.fields,
				pageSize: options.pageSize,
			});
		},
		async close() {
			await transport.close();
		},
	};
}
