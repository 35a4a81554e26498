import { TimeoutError } from './errors.js';

/**
 * Bound the caller's wait on a promise.
 *
 * The underlying work is not cancelled: on expiry only the returned promise
 * rejects with a {@link TimeoutError}. The timer is cleared as soon as the
 * promise settles. With `timeoutMs` undefined the promise is returned as is.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined, operation: string): Promise<T> {
	if (timeoutMs === undefined) {
		return promise;
	}

	return new Promise<T>((resolve, reject) => {
		const timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);

		promise.then(
			(value) => {
				clearTimeout(timer);
				resolve(value);
			},
			(error: unknown) => {
				clearTimeout(timer);
				reject(error);
			},
		);
	});
}
