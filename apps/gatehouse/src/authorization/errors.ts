/**
 * Authorization error types using discriminated unions for neverthrow
 */

import { TimeoutError } from '@gatehouse/memo-cache';
import type { AccessMode } from '../domain/index.js';

export type TimeoutFailure = { type: 'timeout'; operation: string; durationMs: number };

/**
 * Commit of staged grants failed; nothing was applied.
 */
export type GrantWriteError =
	| { type: 'grant_write_failed'; resourceId: string; modes: readonly AccessMode[]; cause: Error }
	| TimeoutFailure;

export type GrantReadError = { type: 'grant_read_failed'; resourceId: string; cause: Error } | TimeoutFailure;

function asError(value: unknown): Error {
	return value instanceof Error ? value : new Error(String(value));
}

/**
 * Helpers to create authorization errors
 */
export const GrantErrors = {
	writeFailed: (resourceId: string, modes: readonly AccessMode[], cause: unknown): GrantWriteError =>
		cause instanceof TimeoutError
			? GrantErrors.timeout(cause)
			: { type: 'grant_write_failed', resourceId, modes, cause: asError(cause) },
	readFailed: (resourceId: string, cause: unknown): GrantReadError =>
		cause instanceof TimeoutError
			? GrantErrors.timeout(cause)
			: { type: 'grant_read_failed', resourceId, cause: asError(cause) },
	timeout: (error: TimeoutError): TimeoutFailure => ({
		type: 'timeout',
		operation: error.operation,
		durationMs: error.timeoutMs,
	}),
};
