/**
 * Shared types for the column store ⇄ search index replicator.
 */

/**
 * A record as it travels between the two stores.
 * `fields` holds the configured sync fields in configuration order.
 */
export interface SyncRecord {
  /** Identifier, compared as a string across both stores. */
  readonly id: string;
  /** Integer version, conventionally unix seconds of the last write. */
  readonly version: number;
  readonly fields: Readonly<Record<string, unknown>>;
}

/** Inclusive version range processed by one pass. */
export interface VersionWindow {
  readonly from: number;
  readonly to: number;
}

/** Outcome of flushing one batch; the two counts sum to the batch size. */
export interface WriteStats {
  succeeded: number;
  skippedOrFailed: number;
}

/** Direction of a sync phase. */
export type Direction = 'search-to-column' | 'column-to-search';

/** Durable single-integer watermark. */
export interface CheckpointStore {
  /** Last saved watermark, or 0 when nothing has been saved yet. */
  load(): Promise<number>;
  /** Overwrite the watermark; readers see either the old or the new value. */
  save(watermark: number): Promise<void>;
  /** Same as `save(0)`: the next pass is a full resync. */
  reset(): Promise<void>;
}

/** Callbacks for records that never reach the target store. */
export interface RecordHooks {
  /** A row or document that could not be decoded, or a record that could not be encoded. */
  rejected?(reason: string): void;
  /** A decoded record outside the requested window. */
  discarded?(record: SyncRecord): void;
}

/**
 * Produces records, restricted to `window` when one is given.
 * Scanners that cannot push the window down to their store filter client-side
 * and report each dropped record through `hooks.discarded`.
 */
export interface RecordScanner {
  scan(window?: VersionWindow, hooks?: RecordHooks): AsyncIterable<SyncRecord>;
}

/**
 * Applies a batch using the target store's own conflict resolution.
 * Records passed to `hooks.rejected` are also counted in `skippedOrFailed`.
 */
export interface RecordWriter {
  write(batch: readonly SyncRecord[], hooks?: RecordHooks): Promise<WriteStats>;
}

export interface PhaseSummary {
  /** Records produced by the scanner, discarded ones included. */
  scanned: number;
  /** Records outside the window, dropped client-side. */
  discarded: number;
  /** Rows that could not be decoded plus records the writer could not encode. */
  rejected: number;
  batches: number;
  succeeded: number;
  skippedOrFailed: number;
}

export interface PassSummary {
  /** `null` for a full resync. */
  window: VersionWindow | null;
  /** Watermark saved at the end of the pass. */
  checkpoint: number;
  phases: Record<'searchToColumn' | 'columnToSearch', PhaseSummary>;
}

export function inWindow(version: number, window: VersionWindow | undefined): boolean {
  if (!window) return true;
  return version >= window.from && version <= window.to;
}

/** A row of the column store, keyed by column name. */
export type ColumnRow = Record<string, unknown>;

export type StatementKind = 'select-all' | 'upsert-with-timestamp';

/** A statement built once and reused for every batch or scan. */
export interface PreparedQuery {
  readonly kind: StatementKind;
  readonly table: string;
  readonly columns: readonly string[];
  readonly cql: string;
}

/** A row plus the write-time (microseconds) the store should stamp on its cells. */
export interface TimestampedRow {
  readonly values: ColumnRow;
  readonly writeTime: number;
}

/**
 * Column store binding.
 * Conflicts are settled by the store: for each cell the highest write-time wins.
 */
export interface ColumnStoreAdapter {
  prepare(kind: StatementKind, columns: readonly string[]): PreparedQuery;
  /** Apply every row, or none of them when `atomic`. Rejects on failure. */
  executeBatch(statement: PreparedQuery, rows: readonly TimestampedRow[], options: { atomic: boolean }): Promise<void>;
  /** Every row of the table, each exactly once. */
  scanAll(statement: PreparedQuery): AsyncIterable<ColumnRow>;
  close(): Promise<void>;
}

/** A document ready for a versioned bulk write. */
export interface IndexDocument {
  id: string;
  version: number;
  source: Record<string, unknown>;
}

export interface SearchScanQuery {
  /** `_source` fields to return. */
  readonly fields: readonly string[];
  readonly versionField: string;
  /** Inclusive range on `versionField`, evaluated by the index. */
  readonly range?: VersionWindow;
}

export interface BulkWriteResult {
  succeeded: number;
  /** Rejected because the stored version was equal or newer. */
  conflicts: number;
  failed: number;
  firstError?: string;
}

/**
 * Search index binding.
 * With `versioned`, a document only replaces one with a strictly lower version.
 */
export interface SearchIndexAdapter {
  bulkWrite(documents: readonly IndexDocument[], options: { versioned: boolean }): Promise<BulkWriteResult>;
  scan(query: SearchScanQuery): AsyncIterable<Record<string, unknown>>;
  close(): Promise<void>;
}
