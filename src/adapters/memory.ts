import type {
  BulkWriteResult,
  ColumnRow,
  ColumnStoreAdapter,
  IndexDocument,
  PreparedQuery,
  SearchIndexAdapter,
  SearchScanQuery,
  TimestampedRow,
} from "../types";
import { assertKind, buildStatement } from "./cql";
import { toVersion } from "../codec";
import { SyncError } from "../shared/errors";

type Cell = { value: unknown; writeTime: number };

/**
 * Tie-break for equal write-times: the larger value wins, so replicas converge
 * regardless of arrival order.
 */
function cellWins(incoming: Cell, existing: Cell | undefined): boolean {
  if (!existing) return true;
  if (incoming.writeTime !== existing.writeTime) return incoming.writeTime > existing.writeTime;
  return JSON.stringify(incoming.value ?? null) > JSON.stringify(existing.value ?? null);
}

/**
 * In-memory column store backed by Maps. Useful for tests and examples.
 *
 * Each cell keeps its own write-time, and a write only replaces cells whose
 * write-time is lower.
 */
export class MemoryColumnStore implements ColumnStoreAdapter {
  private readonly rows: Map<string, { key: unknown; cells: Map<string, Cell> }> = new Map();
  private readonly table: string;
  private readonly primaryKey: string;
  private readonly failRow?: (row: ColumnRow, index: number) => boolean;
  public batches = 0;
  public closed = false;

  constructor(options?: { table?: string; primaryKey?: string; failRow?: (row: ColumnRow, index: number) => boolean }) {
    this.table = options?.table ?? "records";
    this.primaryKey = options?.primaryKey ?? "id";
    this.failRow = options?.failRow;
  }

  prepare(kind: PreparedQuery["kind"], columns: readonly string[]): PreparedQuery {
    return buildStatement(this.table, kind, columns);
  }

  async executeBatch(statement: PreparedQuery, rows: readonly TimestampedRow[], options: { atomic: boolean }): Promise<void> {
    assertKind(statement, "upsert-with-timestamp");
    if (!statement.columns.includes(this.primaryKey)) {
      throw new SyncError("INVALID_ARGUMENT", `Statement does not bind primary key ${this.primaryKey}`);
    }
    this.batches += 1;
    const failing = this.failRow ? rows.findIndex((r, i) => this.failRow?.(r.values, i) === true) : -1;
    if (options.atomic && failing >= 0) {
      throw new SyncError("STORE_UNAVAILABLE", `Batch rejected at row ${failing}`);
    }
    for (let i = 0; i < rows.length; i++) {
      if (i === failing) throw new SyncError("STORE_UNAVAILABLE", `Batch rejected at row ${failing}`);
      this.applyRow(statement.columns, rows[i]);
    }
  }

  private applyRow(columns: readonly string[], row: TimestampedRow | undefined): void {
    if (!row) return;
    const keyValue = row.values[this.primaryKey];
    if (keyValue === null || keyValue === undefined) {
      throw new SyncError("INVALID_ARGUMENT", `Row has no ${this.primaryKey}`);
    }
    const k = String(keyValue);
    let stored = this.rows.get(k);
    if (!stored) {
      stored = { key: keyValue, cells: new Map() };
      this.rows.set(k, stored);
    }
    for (const column of columns) {
      if (column === this.primaryKey) continue;
      const incoming = { value: row.values[column] ?? null, writeTime: row.writeTime };
      if (cellWins(incoming, stored.cells.get(column))) stored.cells.set(column, incoming);
    }
  }

  async *scanAll(statement: PreparedQuery): AsyncIterable<ColumnRow> {
    assertKind(statement, "select-all");
    // snapshot so writes during the scan do not repeat or skip rows
    const snapshot = Array.from(this.rows.values(), (r) => ({ key: r.key, cells: new Map(r.cells) }));
    for (const stored of snapshot) {
      yield this.project(statement.columns, stored.key, stored.cells);
    }
  }

  private project(columns: readonly string[], key: unknown, cells: Map<string, Cell>): ColumnRow {
    const out: ColumnRow = {};
    for (const column of columns) {
      out[column] = column === this.primaryKey ? key : (cells.get(column)?.value ?? null);
    }
    return out;
  }

  /** Current row for `id`, every stored column included. */
  get(id: string): ColumnRow | undefined {
    const stored = this.rows.get(id);
    if (!stored) return undefined;
    return this.project([this.primaryKey, ...stored.cells.keys()], stored.key, stored.cells);
  }

  writeTimeOf(id: string, column: string): number | undefined {
    return this.rows.get(id)?.cells.get(column)?.writeTime;
  }

  get size(): number {
    return this.rows.size;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

/**
 * In-memory search index. Versioned writes behave like external versioning:
 * an incoming version equal to or older than the stored one is a conflict.
 */
export class MemorySearchIndex implements SearchIndexAdapter {
  private readonly docs: Map<string, { version: number; source: Record<string, unknown> }> = new Map();
  private readonly failDocument?: (doc: IndexDocument) => boolean;
  public bulkRequests = 0;
  public closed = false;

  constructor(options?: { failDocument?: (doc: IndexDocument) => boolean }) {
    this.failDocument = options?.failDocument;
  }

  async bulkWrite(documents: readonly IndexDocument[], options: { versioned: boolean }): Promise<BulkWriteResult> {
    this.bulkRequests += 1;
    const result: BulkWriteResult = { succeeded: 0, conflicts: 0, failed: 0 };
    for (const doc of documents) {
      if (this.failDocument?.(doc)) {
        result.failed += 1;
        result.firstError ??= `mapper_parsing_exception: document ${doc.id} rejected`;
        continue;
      }
      const existing = this.docs.get(doc.id);
      if (options.versioned && existing && doc.version <= existing.version) {
        result.conflicts += 1;
        continue;
      }
      const version = options.versioned ? doc.version : (existing?.version ?? 0) + 1;
      this.docs.set(doc.id, { version, source: { ...doc.source } });
      result.succeeded += 1;
    }
    return result;
  }

  async *scan(query: SearchScanQuery): AsyncIterable<Record<string, unknown>> {
    const snapshot = Array.from(this.docs.values());
    for (const doc of snapshot) {
      if (query.range) {
        const v = toVersion(doc.source[query.versionField]);
        if (v === undefined || v < query.range.from || v > query.range.to) continue;
      }
      const out: Record<string, unknown> = {};
      for (const f of query.fields) {
        if (f in doc.source) out[f] = doc.source[f];
      }
      yield out;
    }
  }

  get(id: string): Record<string, unknown> | undefined {
    const doc = this.docs.get(id);
    return doc ? { ...doc.source } : undefined;
  }

  /** Internal document version (the `_version` of a real index). */
  versionOf(id: string): number | undefined {
    return this.docs.get(id)?.version;
  }

  get size(): number {
    return this.docs.size;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
