/**
 * Memoizing Cache
 *
 * Bounded, time-limited cache that runs at most one computation per key at a
 * time. Concurrent misses for the same key attach to the computation already
 * in flight instead of starting their own.
 *
 * - Ready entries live in an `LRUCache` bounded by `capacity` with `ttlMs`
 *   expiry checked on access.
 * - In-flight computations live in a separate Map and do not count against
 *   capacity.
 * - Eviction and expiry never touch an in-flight computation. A `set`,
 *   `invalidate` or `clear` that lands while a computation is in flight
 *   supersedes it: its waiters still get the value, but it is not stored.
 */

import { LRUCache } from 'lru-cache';
import type { Logger } from '@gatehouse/logging';
import { createSilentLogger } from '@gatehouse/logging';
import { ComputeError } from './errors.js';
import { withTimeout } from './timeout.js';

/**
 * Cache construction options.
 */
export interface MemoizingCacheOptions {
	/** Maximum number of ready entries */
	readonly capacity: number;
	/** Entry lifetime in milliseconds */
	readonly ttlMs: number;
	/** Millisecond time source for expiry (defaults to performance.now) */
	readonly clock?: () => number;
	/** Logger; a silent one is used when omitted */
	readonly logger?: Logger;
	/** Name used in log lines and timeout messages */
	readonly name?: string;
}

/**
 * Per-call options for {@link MemoizingCache.getOrCompute}.
 */
export interface GetOrComputeOptions {
	/** Maximum time this caller waits for the value */
	readonly timeoutMs?: number;
}

// lru-cache refuses undefined values, and a memoized "absent" is a valid result.
interface Slot<V> {
	readonly value: V;
}

export class MemoizingCache<K extends {}, V> {
	private readonly ready: LRUCache<K, Slot<V>>;
	private readonly pending = new Map<K, Promise<V>>();
	private readonly superseded = new Set<K>();
	private readonly name: string;
	private readonly logger: Logger;

	constructor(options: MemoizingCacheOptions) {
		if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
			throw new RangeError(`Cache capacity must be a positive integer, got ${options.capacity}`);
		}
		if (!Number.isFinite(options.ttlMs) || options.ttlMs <= 0) {
			throw new RangeError(`Cache ttl must be a positive number of milliseconds, got ${options.ttlMs}`);
		}

		this.name = options.name ?? 'memoizing-cache';
		this.logger = (options.logger ?? createSilentLogger()).child({ component: 'MemoizingCache', cache: this.name });
		this.ready = new LRUCache<K, Slot<V>>({
			max: options.capacity,
			ttl: options.ttlMs,
			ttlResolution: 0,
			...(options.clock ? { perf: { now: options.clock } } : {}),
			dispose: (_slot, key, reason) => {
				if (reason === 'evict') {
					this.logger.debug({ key }, 'Evicted least recently used entry');
				} else if (reason === 'expire') {
					this.logger.debug({ key }, 'Entry expired');
				}
			},
		});
	}

	/**
	 * Number of ready entries held (expired entries not yet accessed included).
	 */
	get size(): number {
		return this.ready.size;
	}

	/**
	 * Number of computations currently in flight.
	 */
	get pendingCount(): number {
		return this.pending.size;
	}

	/**
	 * Return the cached value for `key`, computing it if absent or expired.
	 *
	 * Callers arriving while a computation for `key` is in flight share its
	 * outcome; a failure rejects all of them with the same {@link ComputeError}
	 * and leaves nothing cached. A `timeoutMs` bounds only this caller's wait.
	 */
	async getOrCompute(key: K, compute: () => V | Promise<V>, options: GetOrComputeOptions = {}): Promise<V> {
		const slot = this.ready.get(key);
		if (slot) {
			return slot.value;
		}

		// Lookup, registration and attachment all happen before the first await,
		// so two callers can never both see an empty slot for the same key.
		const computation = this.pending.get(key) ?? this.start(key, compute);

		return withTimeout(computation, options.timeoutMs, `${this.name}:${String(key)}`);
	}

	/**
	 * Ready, unexpired value for `key`, without changing LRU order or computing.
	 */
	peek(key: K): V | undefined {
		return this.ready.peek(key)?.value;
	}

	/**
	 * Store a value known to be current, as if a computation had just produced it.
	 */
	set(key: K, value: V): void {
		this.supersede(key);
		this.ready.set(key, { value });
	}

	/**
	 * Drop the ready entry for `key`. An in-flight computation still settles
	 * for its waiters but no longer populates the cache.
	 *
	 * @returns true if an entry was removed
	 */
	invalidate(key: K): boolean {
		this.supersede(key);
		return this.ready.delete(key);
	}

	/**
	 * Drop all ready entries and supersede every in-flight computation.
	 */
	clear(): void {
		for (const key of this.pending.keys()) {
			this.superseded.add(key);
		}
		this.ready.clear();
	}

	private start(key: K, compute: () => V | Promise<V>): Promise<V> {
		this.logger.debug({ key }, 'Cache miss, starting computation');

		const computation: Promise<V> = Promise.resolve()
			.then(compute)
			.then(
				(value) => {
					if (this.release(key, computation)) {
						this.ready.set(key, { value });
					} else {
						this.logger.debug({ key }, 'Computation superseded, result not cached');
					}
					return value;
				},
				(cause: unknown) => {
					this.release(key, computation);
					this.logger.debug({ key, err: cause }, 'Computation failed, nothing cached');
					throw new ComputeError(String(key), cause);
				},
			);

		this.pending.set(key, computation);
		return computation;
	}

	private supersede(key: K): void {
		if (this.pending.has(key)) {
			this.superseded.add(key);
		}
	}

	/**
	 * Detach a settled computation.
	 *
	 * @returns true if its result may still be stored
	 */
	private release(key: K, computation: Promise<V>): boolean {
		if (this.pending.get(key) !== computation) {
			return false;
		}
		this.pending.delete(key);
		return !this.superseded.delete(key);
	}
}
