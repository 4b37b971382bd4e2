import { describe, it, expect } from 'vitest';
import { Scheduler } from '../scheduler';
import { formatEvent, type SyncReporter } from '../reporter';
import type { PassSummary } from '../types';

function summary(checkpoint: number): PassSummary {
	const phase = { scanned: 0, discarded: 0, rejected: 0, batches: 0, succeeded: 0, skippedOrFailed: 0 };
	return { window: null, checkpoint, phases: { searchToColumn: { ...phase }, columnToSearch: { ...phase } } };
}

/** Engine that succeeds `passes` times and then fails. */
function flakyEngine(passes: number) {
	let calls = 0;
	return {
		get calls() { return calls; },
		async runPass(): Promise<PassSummary> {
			calls += 1;
			if (calls > passes) throw new Error(`pass ${calls} failed`);
			return summary(calls);
		},
	};
}

function recorder(): { reporter: SyncReporter; lines: string[] } {
	const lines: string[] = [];
	return { lines, reporter: { on: (event, data) => lines.push(formatEvent(event, data).message) } };
}

describe('Scheduler.runOnce', () => {
	it('runs one pass and reports how long it took', async () => {
		const ticks = [1000, 3500];
		const { reporter, lines } = recorder();
		const scheduler = new Scheduler(flakyEngine(1), { intervalSeconds: 5, reporter, now: () => ticks.shift() ?? 0 });

		const result = await scheduler.runOnce();

		expect(result.checkpoint).toBe(1);
		expect(lines).toEqual(['Took 2.500 seconds to sync']);
	});

	it('lets a failing pass reject', async () => {
		const scheduler = new Scheduler(flakyEngine(0), { intervalSeconds: 5 });
		await expect(scheduler.runOnce()).rejects.toThrow('pass 1 failed');
	});
});

describe('Scheduler.runForever', () => {
	it('rests between passes and stops on the first failure', async () => {
		const engine = flakyEngine(2);
		const sleeps: number[] = [];
		const { reporter, lines } = recorder();
		const scheduler = new Scheduler(engine, { intervalSeconds: 10, reporter, sleep: async (ms) => { sleeps.push(ms); }, now: () => 0 });

		await expect(scheduler.runForever()).rejects.toThrow('pass 3 failed');

		expect(engine.calls).toBe(3);
		expect(sleeps).toEqual([10000, 10000]);
		expect(lines.filter((l) => l.startsWith('Resting'))).toEqual(['Resting for 10 seconds', 'Resting for 10 seconds']);
	});

	it('does not sleep when the interval is negative', async () => {
		const engine = flakyEngine(3);
		const sleeps: number[] = [];
		const scheduler = new Scheduler(engine, { intervalSeconds: -1, sleep: async (ms) => { sleeps.push(ms); } });

		await expect(scheduler.runForever()).rejects.toThrow('pass 4 failed');

		expect(sleeps).toEqual([]);
	});

	it('still yields between passes with a zero interval', async () => {
		const sleeps: number[] = [];
		const scheduler = new Scheduler(flakyEngine(1), { intervalSeconds: 0, sleep: async (ms) => { sleeps.push(ms); } });

		await expect(scheduler.runForever()).rejects.toThrow('pass 2 failed');

		expect(sleeps).toEqual([0]);
	});
});
