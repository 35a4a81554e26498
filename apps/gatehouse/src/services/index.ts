/**
 * Service wiring
 *
 * Builds every long-lived component once from parsed configuration. Nothing
 * below reads the environment itself.
 */

import type { Logger } from '@gatehouse/logging';
import { MemoizingCache } from '@gatehouse/memo-cache';
import { createDatabase } from '@gatehouse/persistence';
import type { Env } from '../env.js';
import type { BackingStore } from '../infrastructure/backing-store.js';
import { InMemoryBackingStore } from '../infrastructure/memory/in-memory-backing-store.js';
import { createDrizzleBackingStore } from '../infrastructure/persistence/index.js';
import {
	IdentityReconciler,
	IdentityResolver,
	type IdentityLookupCache,
	type ProvisioningCache,
} from '../identity/index.js';
import { AuthorizationComposer, RoleGrantResolver } from '../authorization/index.js';

export type ServicesConfig = Pick<
	Env,
	| 'BACKING_STORE'
	| 'DATABASE_URL'
	| 'IDENTITY_CACHE_CAPACITY'
	| 'IDENTITY_CACHE_TTL_MS'
	| 'IDENTITY_LOOKUP_TIMEOUT_MS'
	| 'GRANT_WRITE_TIMEOUT_MS'
	| 'PRIVILEGED_AFFILIATION'
	| 'ROLE_SUBJECT_NAMESPACE'
>;

export interface Services {
	store: BackingStore;
	identityCache: IdentityLookupCache;
	provisioningCache: ProvisioningCache;
	resolver: IdentityResolver;
	reconciler: IdentityReconciler;
	roleGrants: RoleGrantResolver;
	composer: AuthorizationComposer;
	/** Release the store's connections and drop cached state */
	close(): Promise<void>;
}

export interface CreateServicesOptions {
	/** Use this store instead of the one BACKING_STORE selects */
	store?: BackingStore;
	/** Time source for both caches */
	clock?: () => number;
}

function createStore(config: ServicesConfig, logger: Logger): BackingStore {
	if (config.BACKING_STORE === 'postgres') {
		const database = createDatabase({ url: config.DATABASE_URL, logger });
		return createDrizzleBackingStore(database.db, { logger, onClose: () => database.close() });
	}
	return new InMemoryBackingStore();
}

export function createServices(config: ServicesConfig, logger: Logger, options: CreateServicesOptions = {}): Services {
	const store = options.store ?? createStore(config, logger);
	logger.info({ backingStore: options.store ? 'provided' : config.BACKING_STORE }, 'Backing store ready');

	const cacheOptions = {
		capacity: config.IDENTITY_CACHE_CAPACITY,
		ttlMs: config.IDENTITY_CACHE_TTL_MS,
		clock: options.clock,
		logger,
	};
	const identityCache: IdentityLookupCache = new MemoizingCache({ ...cacheOptions, name: 'identity-lookup' });
	const provisioningCache: ProvisioningCache = new MemoizingCache({ ...cacheOptions, name: 'identity-provisioning' });

	const roleGrants = new RoleGrantResolver({ namespace: config.ROLE_SUBJECT_NAMESPACE });

	return {
		store,
		identityCache,
		provisioningCache,
		roleGrants,
		resolver: new IdentityResolver({
			store,
			cache: identityCache,
			privilegedAffiliation: config.PRIVILEGED_AFFILIATION,
			lookupTimeoutMs: config.IDENTITY_LOOKUP_TIMEOUT_MS,
			logger,
		}),
		reconciler: new IdentityReconciler({
			store,
			identityCache,
			provisioningCache,
			timeoutMs: config.IDENTITY_LOOKUP_TIMEOUT_MS,
			logger,
		}),
		composer: new AuthorizationComposer({
			store,
			roleGrants,
			writeTimeoutMs: config.GRANT_WRITE_TIMEOUT_MS,
			logger,
		}),
		async close() {
			identityCache.clear();
			provisioningCache.clear();
			await store.close();
		},
	};
}
