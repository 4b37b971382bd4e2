/** Group an async sequence into arrays of at most `size` items; the last one may be shorter. */
export async function* batches<T>(source: AsyncIterable<T>, size: number): AsyncGenerator<T[]> {
	if (!Number.isInteger(size) || size <= 0) throw new RangeError(`batch size must be a positive integer, got ${size}`);
	let buffer: T[] = [];
	for await (const item of source) {
		buffer.push(item);
		if (buffer.length >= size) {
			yield buffer;
			buffer = [];
		}
	}
	if (buffer.length > 0) yield buffer;
}
