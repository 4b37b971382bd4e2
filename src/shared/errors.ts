export type ErrorCode = 'BAD_CONFIG' | 'INVALID_ARGUMENT' | 'CHECKPOINT_CORRUPT' | 'STORE_UNAVAILABLE' | 'INTERNAL';

export class SyncError extends Error {
	code: ErrorCode;
	details?: Record<string, unknown>;

	constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
		super(message, options);
		this.name = 'SyncError';
		this.code = code;
		this.details = details;
	}
}

export function toSyncError(e: unknown): SyncError {
	if (e instanceof SyncError) return e;
	if (e instanceof Error) {
		const code = normalizeCode('code' in e ? e.code : undefined);
		return new SyncError(code, e.message || 'Internal error', undefined, { cause: e });
	}
	return new SyncError('INTERNAL', typeof e === 'string' ? e : 'Internal error', { thrown: e });
}

function normalizeCode(code: unknown): ErrorCode {
	if (code === 'BAD_CONFIG' || code === 'INVALID_ARGUMENT' || code === 'CHECKPOINT_CORRUPT' || code === 'STORE_UNAVAILABLE' || code === 'INTERNAL') return code;
	return 'INTERNAL';
}

/** Short single-line description of anything thrown, for log lines. */
export function describeError(e: unknown): string {
	const err = toSyncError(e);
	return err.code === 'INTERNAL' ? err.message : `${err.code}: ${err.message}`;
}
