import { describe, it, expect, vi, afterEach } from 'vitest';
import { withTimeout } from '../timeout.js';
import { TimeoutError } from '../errors.js';

describe('withTimeout', () => {
	afterEach(() => {
		vi.useRealTimers();
	});

	it('should return the promise itself when no timeout is given', () => {
		const promise = Promise.resolve(1);

		expect(withTimeout(promise, undefined, 'op')).toBe(promise);
	});

	it('should resolve with the value when it settles in time', async () => {
		await expect(withTimeout(Promise.resolve('ok'), 1000, 'op')).resolves.toBe('ok');
	});

	it('should pass through a rejection that happens in time', async () => {
		const failure = new Error('nope');

		await expect(withTimeout(Promise.reject(failure), 1000, 'op')).rejects.toBe(failure);
	});

	it('should reject with a TimeoutError once the deadline passes', async () => {
		vi.useFakeTimers();
		const never = new Promise<string>(() => undefined);

		const bounded = withTimeout(never, 250, 'grant-write');
		vi.advanceTimersByTime(250);

		await expect(bounded).rejects.toMatchObject({
			name: 'TimeoutError',
			code: 'E_TIMEOUT',
			operation: 'grant-write',
			timeoutMs: 250,
		});
		await expect(bounded).rejects.toBeInstanceOf(TimeoutError);
	});

	it('should clear its timer when the promise settles first', async () => {
		vi.useFakeTimers();

		await withTimeout(Promise.resolve('fast'), 500, 'op');

		expect(vi.getTimerCount()).toBe(0);
	});
});
