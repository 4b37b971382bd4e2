import type { CheckpointStore } from '../types';
import { assertWatermark } from './validate';

/** Process-local checkpoint; lost on exit. */
export class MemoryCheckpointStore implements CheckpointStore {
	private value: number;

	constructor(initial = 0) {
		this.value = assertWatermark(initial);
	}

	async load(): Promise<number> {
		return this.value;
	}

	async save(watermark: number): Promise<void> {
		this.value = assertWatermark(watermark);
	}

	async reset(): Promise<void> {
		await this.save(0);
	}
}
