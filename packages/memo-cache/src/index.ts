/**
 * @gatehouse/memo-cache
 *
 * Single-flight, LRU-bounded, TTL-limited memoizing cache.
 *
 * @example
 * ```typescript
 * import { MemoizingCache } from '@gatehouse/memo-cache';
 *
 * const cache = new MemoizingCache<string, string | undefined>({ capacity: 100, ttlMs: 600_000 });
 * const id = await cache.getOrCompute(durableKey, () => store.findIdentityByKey(durableKey));
 * ```
 */

export { MemoizingCache, type MemoizingCacheOptions, type GetOrComputeOptions } from './memoizing-cache.js';
export { ComputeError, TimeoutError, ErrorCodes, type ErrorCode } from './errors.js';
export { withTimeout } from './timeout.js';
