import { setTimeout as delay } from 'node:timers/promises';
import { performance } from 'node:perf_hooks';
import type { PassSummary } from './types';
import type { SyncReporter } from './reporter';
import { silentReporter } from './reporter';

export interface SchedulerOptions {
	/** Pause between passes; negative runs passes back to back. */
	intervalSeconds: number;
	reporter?: SyncReporter;
	sleep?: (ms: number) => Promise<void>;
	/** Monotonic milliseconds, for measuring pass duration. */
	now?: () => number;
}

/**
 * Drives an engine once, or forever on a fixed interval.
 * There is no stop signal: an error from a pass ends `runForever` with that error.
 */
export class Scheduler {
	private readonly engine: { runPass(): Promise<PassSummary> };
	private readonly intervalSeconds: number;
	private readonly reporter: SyncReporter;
	private readonly sleep: (ms: number) => Promise<void>;
	private readonly now: () => number;

	constructor(engine: { runPass(): Promise<PassSummary> }, options: SchedulerOptions) {
		this.engine = engine;
		this.intervalSeconds = options.intervalSeconds;
		this.reporter = options.reporter ?? silentReporter;
		this.sleep = options.sleep ?? ((ms) => delay(ms).then(() => undefined));
		this.now = options.now ?? (() => performance.now());
	}

	async runOnce(): Promise<PassSummary> {
		const start = this.now();
		const summary = await this.engine.runPass();
		const seconds = (this.now() - start) / 1000;
		this.reporter.on('passFinished', { summary, seconds });
		return summary;
	}

	async runForever(): Promise<never> {
		for (;;) {
			await this.runOnce();
			if (this.intervalSeconds >= 0) {
				this.reporter.on('resting', { seconds: this.intervalSeconds });
				await this.sleep(this.intervalSeconds * 1000);
			}
		}
	}
}
