/**
 * Memoizing cache error codes.
 */
export const ErrorCodes = {
	/** The memoized computation threw or rejected */
	COMPUTE_FAILED: 'E_COMPUTE_FAILED',
	/** A caller stopped waiting before the value was ready */
	TIMEOUT: 'E_TIMEOUT',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

function describeCause(cause: unknown): string {
	return cause instanceof Error ? cause.message : String(cause);
}

/**
 * Raised to every waiter of a computation that failed. The failure is never
 * cached; the next caller for the key starts a fresh computation.
 */
export class ComputeError extends Error {
	readonly code: ErrorCode = ErrorCodes.COMPUTE_FAILED;
	readonly key: string;

	constructor(key: string, cause: unknown) {
		super(`Computation for key '${key}' failed: ${describeCause(cause)}`, { cause });
		this.name = 'ComputeError';
		this.key = key;
	}
}

/**
 * Raised to a caller whose wait exceeded its timeout. Whatever it was waiting
 * on keeps running.
 */
export class TimeoutError extends Error {
	readonly code: ErrorCode = ErrorCodes.TIMEOUT;
	readonly operation: string;
	readonly timeoutMs: number;

	constructor(operation: string, timeoutMs: number) {
		super(`Operation '${operation}' timed out after ${timeoutMs}ms`);
		this.name = 'TimeoutError';
		this.operation = operation;
		this.timeoutMs = timeoutMs;
	}
}
