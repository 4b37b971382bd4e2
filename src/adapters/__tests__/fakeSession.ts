import type { ColumnRow } from '../../types';
import type { CqlOptions, CqlQuery, CqlSession } from '../cassandra';

export type ExecuteCall = { query: string; params: readonly unknown[]; options?: CqlOptions };
export type BatchCall = { queries: readonly CqlQuery[]; options: { logged: boolean } };

/** Records every call; `rows` answers execute and stream. */
export function fakeSession(rows: (query: string, params: readonly unknown[]) => ColumnRow[] = () => []) {
	const executes: ExecuteCall[] = [];
	const streams: ExecuteCall[] = [];
	const batches: BatchCall[] = [];
	let shutdowns = 0;
	let failBatch: Error | undefined;
	const session: CqlSession = {
		async execute(query, params, options) {
			executes.push({ query, params, options });
			return rows(query, params);
		},
		async *stream(query, params, options) {
			streams.push({ query, params, options });
			yield* rows(query, params);
		},
		async batch(queries, options) {
			batches.push({ queries, options });
			if (failBatch) throw failBatch;
		},
		async shutdown() {
			shutdowns += 1;
		},
	};
	return {
		session,
		executes,
		streams,
		batches,
		get shutdowns() { return shutdowns; },
		failBatchWith(error: Error) { failBatch = error; },
	};
}
