import { describe, it, expect } from 'vitest';
import { batches } from '../batch';

async function* numbers(n: number): AsyncIterable<number> {
	for (let i = 1; i <= n; i++) yield i;
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
	const out: T[] = [];
	for await (const item of source) out.push(item);
	return out;
}

describe('batches', () => {
	it('groups items and flushes the remainder', async () => {
		expect(await collect(batches(numbers(5), 2))).toEqual([[1, 2], [3, 4], [5]]);
	});

	it('yields nothing for an empty source', async () => {
		expect(await collect(batches(numbers(0), 3))).toEqual([]);
	});

	it('does not emit an empty trailing batch', async () => {
		expect(await collect(batches(numbers(4), 2))).toEqual([[1, 2], [3, 4]]);
	});

	it('rejects sizes that are not positive integers', async () => {
		await expect(collect(batches(numbers(1), 0))).rejects.toThrow('batch size must be a positive integer, got 0');
	});
});
