import { Client, types } from 'cassandra-driver';
import type { ColumnRow, ColumnStoreAdapter, PreparedQuery, TimestampedRow } from '../types';
import type { ColumnStoreConfig } from '../config';
import { assertKind, buildStatement } from './cql';
import { SyncError } from '../shared/errors';

export type Consistency = 'one' | 'localQuorum' | 'quorum';

export interface CqlOptions {
	fetchSize?: number;
	consistency?: Consistency;
}

export interface CqlQuery {
	query: string;
	params: readonly unknown[];
}

/**
 * The slice of a CQL session the replicator uses.
 * Statements are always sent as prepared statements.
 */
export interface CqlSession {
	/** First page of results. */
	execute(query: string, params: readonly unknown[], options?: CqlOptions): Promise<ColumnRow[]>;
	/** All pages, fetched lazily. */
	stream(query: string, params: readonly unknown[], options?: CqlOptions): AsyncIterable<ColumnRow>;
	batch(queries: readonly CqlQuery[], options: { logged: boolean; consistency?: Consistency }): Promise<void>;
	shutdown(): Promise<void>;
}

function rowToObject(row: unknown): ColumnRow {
	if (typeof row !== 'object' || row === null) return {};
	return Object.fromEntries(Object.entries(row));
}

/** Wrap a cassandra-driver client. */
export function driverSession(client: Client): CqlSession {
	const consistency = (c: Consistency | undefined) => (c ? types.consistencies[c] : undefined);
	return {
		async execute(query, params, options) {
			const rs = await client.execute(query, [...params], { prepare: true, fetchSize: options?.fetchSize, consistency: consistency(options?.consistency) });
			return rs.rows.map(rowToObject);
		},
		async *stream(query, params, options) {
			let pageState: string | undefined;
			do {
				const rs = await client.execute(query, [...params], {
					prepare: true,
					fetchSize: options?.fetchSize ?? 1000,
					pageState,
					consistency: consistency(options?.consistency),
				});
				for (const row of rs.rows) yield rowToObject(row);
				pageState = rs.pageState || undefined;
			} while (pageState);
		},
		async batch(queries, options) {
			await client.batch(
				queries.map((q) => ({ query: q.query, params: [...q.params] })),
				{ prepare: true, logged: options.logged, consistency: consistency(options.consistency) },
			);
		},
		async shutdown() {
			await client.shutdown();
		},
	};
}

export async function connectCassandra(config: ColumnStoreConfig): Promise<CqlSession> {
	const client = new Client({ contactPoints: config.hosts, localDataCenter: config.localDataCenter, keyspace: config.keyspace });
	try {
		await client.connect();
	} catch (e) {
		throw new SyncError('STORE_UNAVAILABLE', `Cannot connect to Cassandra at ${config.hosts.join(',')}`, { keyspace: config.keyspace }, { cause: e });
	}
	return driverSession(client);
}

/**
 * Column store binding for a Cassandra table.
 * Batches are LOGGED when atomic; every insert carries `USING TIMESTAMP` so cell-level LWW applies.
 */
export function cassandraColumnStore(session: CqlSession, options: { table: string; fetchSize?: number }): ColumnStoreAdapter {
	return {
		prepare(kind, columns) {
			return buildStatement(options.table, kind, columns);
		},
		async executeBatch(statement: PreparedQuery, rows: readonly TimestampedRow[], batchOptions) {
			assertKind(statement, 'upsert-with-timestamp');
			if (rows.length === 0) return;
			const queries = rows.map((row) => ({
				query: statement.cql,
				params: [...statement.columns.map((c) => row.values[c] ?? null), types.Long.fromNumber(row.writeTime)],
			}));
			await session.batch(queries, { logged: batchOptions.atomic });
		},
		scanAll(statement) {
			assertKind(statement, 'select-all');
			return session.stream(statement.cql, [], { fetchSize: options.fetchSize });
		},
		async close() {
			await session.shutdown();
		},
	};
}
