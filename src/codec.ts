import { types } from 'cassandra-driver';
import type { IndexDocument, SyncRecord } from './types';
import { SyncError } from './shared/errors';

/** Discriminated result of decoding a store row or document. */
export type Decoded<T> = { ok: true; value: T } | { ok: false; error: string };

/**
 * Converts records to and from one store's wire shape.
 * encode may throw a SyncError with code INVALID_ARGUMENT for values the store cannot hold.
 */
export interface RecordCodec<TWire, TRead = TWire> {
	encode(record: SyncRecord): TWire;
	decode(wire: TRead): Decoded<SyncRecord>;
}

/** Maps record identifiers to a store's native representation. */
export interface IdentifierCodec {
	toStore(id: string): unknown;
	fromStore(value: unknown): string | undefined;
}

export const textIdentifiers: IdentifierCodec = {
	toStore: (id) => id,
	fromStore: (value) => {
		if (typeof value === 'string') return value.length > 0 ? value : undefined;
		if (typeof value === 'number' || typeof value === 'bigint') return String(value);
		return undefined;
	},
};

/** Identifiers held in a CQL `uuid` column, exchanged as canonical hex strings. */
export const uuidIdentifiers: IdentifierCodec = {
	toStore: (id) => {
		try {
			return types.Uuid.fromString(id);
		} catch (e) {
			throw new SyncError('INVALID_ARGUMENT', `"${id}" is not a valid uuid`, { id }, { cause: e });
		}
	},
	fromStore: (value) => {
		if (value instanceof types.Uuid) return value.toString();
		return textIdentifiers.fromStore(value);
	},
};

export function identifierCodec(kind: 'uuid' | 'text'): IdentifierCodec {
	return kind === 'uuid' ? uuidIdentifiers : textIdentifiers;
}

/** Integer version from whatever the store returned (number, bigint, numeric string, Long). */
export function toVersion(value: unknown): number | undefined {
	let n: number;
	if (typeof value === 'number') n = value;
	else if (typeof value === 'bigint') n = Number(value);
	else if (typeof value === 'string' && value.trim() !== '') n = Number(value);
	else if (typeof value === 'object' && value !== null) n = Number(String(value));
	else return undefined;
	return Number.isSafeInteger(n) && n >= 0 ? n : undefined;
}

function isPlainObject(value: object): boolean {
	const proto = Object.getPrototypeOf(value);
	return proto === Object.prototype || proto === null;
}

/**
 * JSON-safe copy of a value read from the column store.
 * Driver value classes (Uuid, Long, InetAddress, LocalDate, BigDecimal...) become their string form.
 */
export function toJsonValue(value: unknown): unknown {
	if (value === undefined || value === null) return null;
	if (typeof value === 'bigint') return Number.isSafeInteger(Number(value)) ? Number(value) : value.toString();
	if (typeof value !== 'object') return value;
	if (Buffer.isBuffer(value)) return value.toString('base64');
	if (value instanceof Date) return value.toISOString();
	if (Array.isArray(value)) return value.map(toJsonValue);
	if (value instanceof Set) return Array.from(value, toJsonValue);
	if (value instanceof Map) return Object.fromEntries(Array.from(value, ([k, v]) => [String(k), toJsonValue(v)]));
	if (isPlainObject(value)) return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, toJsonValue(v)]));
	return String(value);
}

export interface FieldLayout {
	idField: string;
	versionField: string;
	syncFields: readonly string[];
}

function decodeWith(layout: FieldLayout, ids: IdentifierCodec, wire: Record<string, unknown>): Decoded<SyncRecord> {
	const id = ids.fromStore(wire[layout.idField]);
	if (id === undefined) return { ok: false, error: `missing or invalid ${layout.idField}` };
	const version = toVersion(wire[layout.versionField]);
	if (version === undefined) return { ok: false, error: `record ${id} has no integer ${layout.versionField}` };
	const fields: Record<string, unknown> = {};
	for (const f of layout.syncFields) fields[f] = wire[f] ?? null;
	return { ok: true, value: { id, version, fields } };
}

/** Rows of the column store table. */
export function columnRowCodec(layout: FieldLayout, ids: IdentifierCodec): RecordCodec<Record<string, unknown>> {
	return {
		encode(record) {
			const row: Record<string, unknown> = {
				[layout.idField]: ids.toStore(record.id),
				[layout.versionField]: record.version,
			};
			for (const f of layout.syncFields) row[f] = record.fields[f] ?? null;
			return row;
		},
		decode(row) {
			return decodeWith(layout, ids, row);
		},
	};
}

/** `_source` documents of the search index; field values are made JSON-safe on the way in. */
export function searchDocumentCodec(layout: FieldLayout): RecordCodec<IndexDocument, Record<string, unknown>> {
	return {
		encode(record) {
			const source: Record<string, unknown> = {
				[layout.idField]: record.id,
				[layout.versionField]: record.version,
			};
			for (const f of layout.syncFields) source[f] = toJsonValue(record.fields[f]);
			return { id: record.id, version: record.version, source };
		},
		decode(source) {
			return decodeWith(layout, textIdentifiers, source);
		},
	};
}
