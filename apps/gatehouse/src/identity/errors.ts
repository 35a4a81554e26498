/**
 * Identity reconciliation error types using discriminated unions for neverthrow
 */

import { ComputeError, TimeoutError } from '@gatehouse/memo-cache';
import type { TimeoutFailure } from '../authorization/errors.js';

export type ReconcileError =
	| { type: 'identity_missing'; identityId: string }
	| { type: 'identity_read_failed'; identityId: string; cause: Error }
	| { type: 'identity_create_failed'; localKey: string; cause: Error }
	| { type: 'identity_update_failed'; identityId: string; cause: Error }
	| TimeoutFailure;

function asError(value: unknown): Error {
	// memoized failures carry the store error as their cause
	const unwrapped = value instanceof ComputeError ? value.cause : value;
	return unwrapped instanceof Error ? unwrapped : new Error(String(unwrapped));
}

/**
 * Helpers to create reconciliation errors
 */
export const ReconcileErrors = {
	missing: (identityId: string): ReconcileError => ({ type: 'identity_missing', identityId }),
	readFailed: (identityId: string, cause: unknown): ReconcileError => ({
		type: 'identity_read_failed',
		identityId,
		cause: asError(cause),
	}),
	createFailed: (localKey: string, cause: unknown): ReconcileError => ({
		type: 'identity_create_failed',
		localKey,
		cause: asError(cause),
	}),
	updateFailed: (identityId: string, cause: unknown): ReconcileError => ({
		type: 'identity_update_failed',
		identityId,
		cause: asError(cause),
	}),
	timeout: (error: TimeoutError): ReconcileError => ({
		type: 'timeout',
		operation: error.operation,
		durationMs: error.timeoutMs,
	}),
};
