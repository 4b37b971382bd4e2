import type { CheckpointStore, Direction, PassSummary, PhaseSummary, RecordHooks, RecordScanner, RecordWriter, SyncRecord, VersionWindow } from "./types";
import type { SyncReporter } from "./reporter";
import { silentReporter } from "./reporter";
import { batches } from "./shared/batch";
import { SyncError } from "./shared/errors";

export interface SyncEngineOptions {
  checkpoint: CheckpointStore;
  /** Source of the search-to-column phase. */
  searchScanner: RecordScanner;
  /** Source of the column-to-search phase. */
  columnScanner: RecordScanner;
  /** Target of the search-to-column phase. */
  columnWriter: RecordWriter;
  /** Target of the column-to-search phase. */
  searchWriter: RecordWriter;
  batchSize: number;
  reporter?: SyncReporter;
  /** Current time in unix seconds. Defaults to the wall clock. */
  clock?: () => number;
}

export function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}

function emptyPhase(): PhaseSummary {
  return { scanned: 0, discarded: 0, rejected: 0, batches: 0, succeeded: 0, skippedOrFailed: 0 };
}

/**
 * One bidirectional pass per `runPass()` call.
 *
 * @remarks
 * The window is `[lastCheckpoint, now]` with `now` read once when the pass starts,
 * so writes landing mid-pass fall into the next window. The checkpoint only moves
 * once both phases complete; a thrown error leaves it where it was and the next pass
 * redoes the same window. Every write is version-gated by the target store, which
 * makes redoing a window harmless.
 */
export class SyncEngine {
  private readonly checkpoint: CheckpointStore;
  private readonly searchScanner: RecordScanner;
  private readonly columnScanner: RecordScanner;
  private readonly columnWriter: RecordWriter;
  private readonly searchWriter: RecordWriter;
  private readonly batchSize: number;
  private readonly reporter: SyncReporter;
  private readonly clock: () => number;

  constructor(options: SyncEngineOptions) {
    if (!Number.isInteger(options.batchSize) || options.batchSize <= 0) {
      throw new SyncError("INVALID_ARGUMENT", `batchSize must be a positive integer, got ${options.batchSize}`);
    }
    this.checkpoint = options.checkpoint;
    this.searchScanner = options.searchScanner;
    this.columnScanner = options.columnScanner;
    this.columnWriter = options.columnWriter;
    this.searchWriter = options.searchWriter;
    this.batchSize = options.batchSize;
    this.reporter = options.reporter ?? silentReporter;
    this.clock = options.clock ?? unixSeconds;
  }

  async runPass(): Promise<PassSummary> {
    const last = await this.checkpoint.load();
    this.reporter.on("checkpointLoaded", { checkpoint: last });
    // a clock stepping backwards must not move the checkpoint back
    const next = Math.max(this.clock(), last);
    const window: VersionWindow | null = last === 0 ? null : { from: last, to: next };
    this.reporter.on("passStarted", { window });

    const searchToColumn = emptyPhase();
    await this.runPhase("search-to-column", searchToColumn, this.searchScanner, this.columnWriter, window);
    const columnToSearch = emptyPhase();
    await this.runPhase("column-to-search", columnToSearch, this.columnScanner, this.searchWriter, window);

    await this.checkpoint.save(next);
    this.reporter.on("checkpointSaved", { checkpoint: next });
    return { window, checkpoint: next, phases: { searchToColumn, columnToSearch } };
  }

  /** Start the next pass from scratch. */
  async reset(): Promise<void> {
    await this.checkpoint.reset();
    this.reporter.on("checkpointSaved", { checkpoint: 0 });
  }

  private async runPhase(direction: Direction, phase: PhaseSummary, scanner: RecordScanner, writer: RecordWriter, window: VersionWindow | null): Promise<void> {
    const scanHooks: RecordHooks = {
      rejected: (reason) => {
        phase.rejected += 1;
        this.reporter.on("recordRejected", { direction, reason });
      },
      discarded: () => {
        phase.scanned += 1;
        phase.discarded += 1;
      },
    };
    // the writer reports its own rejects
    const writeHooks: RecordHooks = { rejected: () => { phase.rejected += 1; } };
    const source = this.counted(scanner.scan(window ?? undefined, scanHooks), phase);
    for await (const batch of batches(source, this.batchSize)) {
      const stats = await writer.write(batch, writeHooks);
      phase.batches += 1;
      phase.succeeded += stats.succeeded;
      phase.skippedOrFailed += stats.skippedOrFailed;
      this.reporter.on("batchFlushed", { direction, size: batch.length, stats });
    }
  }

  private async *counted(source: AsyncIterable<SyncRecord>, phase: PhaseSummary): AsyncGenerator<SyncRecord> {
    for await (const record of source) {
      phase.scanned += 1;
      yield record;
    }
  }
}
