import { SyncError } from '../shared/errors';

export function assertWatermark(watermark: number): number {
	if (!Number.isSafeInteger(watermark) || watermark < 0) {
		throw new SyncError('INVALID_ARGUMENT', `Checkpoint must be a non-negative integer, got ${watermark}`, { watermark });
	}
	return watermark;
}
