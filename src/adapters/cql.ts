import type { PreparedQuery, StatementKind } from '../types';
import { SyncError } from '../shared/errors';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function assertIdentifier(name: string, what: string): string {
	if (!IDENTIFIER.test(name)) throw new SyncError('INVALID_ARGUMENT', `Invalid CQL ${what}: ${name}`, { name });
	return name;
}

export function buildStatement(table: string, kind: StatementKind, columns: readonly string[]): PreparedQuery {
	assertIdentifier(table, 'table name');
	if (columns.length === 0) throw new SyncError('INVALID_ARGUMENT', 'A statement needs at least one column');
	const cols = columns.map((c) => assertIdentifier(c, 'column name'));
	let cql: string;
	if (kind === 'select-all') {
		cql = `SELECT ${cols.join(',')} FROM ${table}`;
	} else {
		const placeholders = cols.map(() => '?').join(',');
		cql = `INSERT INTO ${table} (${cols.join(',')}) VALUES (${placeholders}) USING TIMESTAMP ?`;
	}
	return { kind, table, columns: [...cols], cql };
}

export function assertKind(statement: PreparedQuery, kind: StatementKind): void {
	if (statement.kind !== kind) {
		throw new SyncError('INVALID_ARGUMENT', `Expected a ${kind} statement, got ${statement.kind}`, { cql: statement.cql });
	}
}
