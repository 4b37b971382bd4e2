import type { CheckpointStore, ColumnStoreAdapter, SearchIndexAdapter } from './types';
import type { SyncConfig } from './config';
import type { SyncReporter } from './reporter';
import { loggingReporter, silentReporter } from './reporter';
import { ConsoleLogger } from './logger';
import { columnRowCodec, identifierCodec, searchDocumentCodec } from './codec';
import { ColumnStoreScanner, SearchIndexScanner } from './scanner';
import { ColumnStoreWriter, SearchIndexWriter } from './writer';
import { SyncEngine } from './engine';
import { Scheduler } from './scheduler';
import { cassandraColumnStore, connectCassandra, type CqlSession } from './adapters/cassandra';
import { connectElasticsearch, elasticsearchIndex } from './adapters/elasticsearch';
import { FileCheckpointStore } from './checkpoint/file';
import { CassandraCheckpointStore } from './checkpoint/cassandra';

export interface Synchronizer {
	readonly engine: SyncEngine;
	readonly scheduler: Scheduler;
	readonly writers: { column: ColumnStoreWriter; search: SearchIndexWriter };
	/** Close both store connections. */
	close(): Promise<void>;
}

export interface CreateSynchronizerOptions {
	config: Pick<SyncConfig, 'idField' | 'versionField' | 'syncFields' | 'batchSize' | 'intervalSeconds'> & {
		columnStore: Pick<SyncConfig['columnStore'], 'idType'>;
	};
	columnStore: ColumnStoreAdapter;
	searchIndex: SearchIndexAdapter;
	checkpoint: CheckpointStore;
	reporter?: SyncReporter;
	/** Unix seconds; defaults to the wall clock. */
	clock?: () => number;
	sleep?: (ms: number) => Promise<void>;
}

/**
 * Assemble scanners, writers, engine and scheduler over already-open stores.
 *
 * @example
 * const sync = createSynchronizer({ config, columnStore: new MemoryColumnStore(), searchIndex: new MemorySearchIndex(), checkpoint: new MemoryCheckpointStore() });
 * await sync.scheduler.runOnce();
 */
export function createSynchronizer(options: CreateSynchronizerOptions): Synchronizer {
	const { config } = options;
	const reporter = options.reporter ?? silentReporter;
	const layout = { idField: config.idField, versionField: config.versionField, syncFields: config.syncFields };
	const rowCodec = columnRowCodec(layout, identifierCodec(config.columnStore.idType));
	const docCodec = searchDocumentCodec(layout);

	const column = new ColumnStoreWriter(options.columnStore, rowCodec, layout, reporter);
	const search = new SearchIndexWriter(options.searchIndex, docCodec, reporter);
	const engine = new SyncEngine({
		checkpoint: options.checkpoint,
		searchScanner: new SearchIndexScanner(options.searchIndex, docCodec, layout),
		columnScanner: new ColumnStoreScanner(options.columnStore, rowCodec, layout),
		columnWriter: column,
		searchWriter: search,
		batchSize: config.batchSize,
		reporter,
		clock: options.clock,
	});
	const scheduler = new Scheduler(engine, { intervalSeconds: config.intervalSeconds, reporter, sleep: options.sleep });

	return {
		engine,
		scheduler,
		writers: { column, search },
		async close() {
			// the Cassandra checkpoint store shares the column store session
			const results = await Promise.allSettled([options.columnStore.close(), options.searchIndex.close()]);
			const failed = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
			if (failed) throw failed.reason;
		},
	};
}

export function createCheckpointStore(config: SyncConfig['checkpoint'], session: CqlSession): CheckpointStore {
	if (config.kind === 'file') return new FileCheckpointStore(config.path);
	return new CassandraCheckpointStore(session, { table: config.table, name: config.name });
}

/** Open real Cassandra and Elasticsearch connections as described by `config`. */
export async function connectSynchronizer(config: SyncConfig, reporter?: SyncReporter): Promise<Synchronizer> {
	const report = reporter ?? loggingReporter(new ConsoleLogger({ level: config.logLevel }));
	if (config.searchIndex.documentType) {
		report.on('configWarning', { message: `searchIndex.documentType "${config.searchIndex.documentType}" is ignored: indices no longer have mapping types` });
	}
	const session = await connectCassandra(config.columnStore);
	const checkpoint = createCheckpointStore(config.checkpoint, session);
	if (checkpoint instanceof CassandraCheckpointStore) {
		try {
			await checkpoint.ensureTable();
		} catch (e) {
			await session.shutdown();
			throw e;
		}
	}
	return createSynchronizer({
		config,
		columnStore: cassandraColumnStore(session, { table: config.columnStore.table }),
		searchIndex: elasticsearchIndex(connectElasticsearch(config.searchIndex), { indexName: config.searchIndex.indexName, pageSize: config.searchIndex.pageSize }),
		checkpoint,
		reporter: report,
	});
}

export * from './types';
export * from './config';
export * from './codec';
export * from './reporter';
export * from './logger';
export * from './shared/errors';
export { SyncEngine, unixSeconds } from './engine';
export { Scheduler } from './scheduler';
export { ColumnStoreScanner, SearchIndexScanner } from './scanner';
export { ColumnStoreWriter, SearchIndexWriter, writeTimeFor } from './writer';
export { MemoryColumnStore, MemorySearchIndex } from './adapters/memory';
export { cassandraColumnStore, connectCassandra, driverSession } from './adapters/cassandra';
export type { CqlSession, CqlQuery, CqlOptions } from './adapters/cassandra';
export { clientTransport, connectElasticsearch, elasticsearchIndex } from './adapters/elasticsearch';
export type { SearchTransport, BulkOperation, BulkItemResult } from './adapters/elasticsearch';
export { FileCheckpointStore } from './checkpoint/file';
export { MemoryCheckpointStore } from './checkpoint/memory';
export { CassandraCheckpointStore } from './checkpoint/cassandra';
