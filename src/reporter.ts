import type { Direction, PassSummary, VersionWindow, WriteStats } from './types';
import type { Logger } from './logger';

/** Payloads of every event the engine and its collaborators report. */
export type SyncReportEvents = {
	checkpointLoaded: { checkpoint: number };
	checkpointSaved: { checkpoint: number };
	passStarted: { window: VersionWindow | null };
	batchFlushed: { direction: Direction; size: number; stats: WriteStats };
	batchFailed: { direction: Direction; size: number; error: unknown };
	itemErrors: { direction: Direction; count: number; firstReason: string };
	recordRejected: { direction: Direction; reason: string };
	passFinished: { summary: PassSummary; seconds: number };
	resting: { seconds: number };
	configWarning: { message: string };
};

export type SyncReportEvent = keyof SyncReportEvents;

/** Observability hook handed to the engine, scheduler and store bindings. */
export interface SyncReporter {
	on<E extends SyncReportEvent>(event: E, data: SyncReportEvents[E]): void;
}

export const silentReporter: SyncReporter = { on() {} };

const LABELS: Record<Direction, string> = {
	'search-to-column': 'ElasticSearch -> Cassandra',
	'column-to-search': 'Cassandra -> ElasticSearch',
};

function windowLabel(window: VersionWindow | null): string {
	return window ? `window [${window.from}, ${window.to}]` : 'full resync';
}

type Line = { level: 'debug' | 'info' | 'warn' | 'error'; message: string };

const FORMATTERS: { [E in SyncReportEvent]: (data: SyncReportEvents[E]) => Line } = {
	checkpointLoaded: (d) => ({ level: 'info', message: `Loaded checkpoint ${d.checkpoint}` }),
	checkpointSaved: (d) => ({ level: 'info', message: `Saving checkpoint ${d.checkpoint}` }),
	passStarted: (d) => ({ level: 'info', message: `Starting sync job (${windowLabel(d.window)})` }),
	batchFlushed: (d) => {
		const { succeeded, skippedOrFailed } = d.stats;
		// column store LWW hides whether a row actually changed
		const message = d.direction === 'search-to-column'
			? `${LABELS[d.direction]}: ${succeeded} successful or up to date, ${skippedOrFailed} failed`
			: `${LABELS[d.direction]}: ${succeeded} successful, ${skippedOrFailed} failed or up to date`;
		return { level: 'info', message };
	},
	batchFailed: (d) => ({ level: 'error', message: `${LABELS[d.direction]}: batch of ${d.size} failed: ${errorText(d.error)}` }),
	itemErrors: (d) => ({ level: 'warn', message: `${LABELS[d.direction]}: ${d.count} documents rejected (${d.firstReason})` }),
	recordRejected: (d) => ({ level: 'warn', message: `${LABELS[d.direction]}: skipping record: ${d.reason}` }),
	passFinished: (d) => ({ level: 'info', message: `Took ${d.seconds.toFixed(3)} seconds to sync` }),
	resting: (d) => ({ level: 'info', message: `Resting for ${d.seconds} seconds` }),
	configWarning: (d) => ({ level: 'warn', message: d.message }),
};

/** Render one event as a log line. */
export function formatEvent<E extends SyncReportEvent>(event: E, data: SyncReportEvents[E]): Line {
	const format: (data: SyncReportEvents[E]) => Line = FORMATTERS[event];
	return format(data);
}

function errorText(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Reporter that writes each event through a logger. */
export function loggingReporter(logger: Logger): SyncReporter {
	return {
		on(event, data) {
			const { level, message } = formatEvent(event, data);
			logger[level](message);
		},
	};
}
