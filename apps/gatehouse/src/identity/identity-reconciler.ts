/**
 * Identity Reconciler
 *
 * Brings the stored identity in line with a freshly resolved user:
 *
 * - linked user: update the record when an authoritative field drifted
 * - unknown privileged user: create the record, once per durable key
 * - unknown non-privileged user: reject without creating anything
 *
 * Stored roles and the local key are never changed here. Write failures are
 * always surfaced.
 */

import { ResultAsync, errAsync, okAsync } from 'neverthrow';
import type { Logger } from '@gatehouse/logging';
import { TimeoutError, withTimeout, type MemoizingCache } from '@gatehouse/memo-cache';
import {
	Role,
	authoritativeDrift,
	newIdentityFor,
	type AuthUser,
	type Identity,
} from '../domain/index.js';
import { BackingStoreError, StoreErrorCodes, type IdentityStore } from '../infrastructure/backing-store.js';
import type { IdentityLookupCache } from './identity-resolver.js';
import { ReconcileErrors, type ReconcileError } from './errors.js';

export type RejectReason = 'not_privileged' | 'missing_durable_key';

export type ReconcileOutcome =
	| { status: 'unchanged' | 'updated' | 'created'; identity: Identity }
	| { status: 'rejected'; reason: RejectReason };

/**
 * Durable key to the id of the identity provisioned for it. Concurrent
 * provisioning for one key collapses onto a single computation.
 */
export type ProvisioningCache = MemoizingCache<string, string>;

export interface IdentityReconcilerOptions {
	store: IdentityStore;
	identityCache: IdentityLookupCache;
	provisioningCache: ProvisioningCache;
	/** Roles given to a newly created identity */
	defaultRoles?: readonly Role[];
	/** Bound on each store call and on waiting for provisioning */
	timeoutMs?: number;
	logger: Logger;
}

export class IdentityReconciler {
	private readonly store: IdentityStore;
	private readonly identityCache: IdentityLookupCache;
	private readonly provisioningCache: ProvisioningCache;
	private readonly defaultRoles: readonly Role[];
	private readonly timeoutMs: number | undefined;
	private readonly logger: Logger;

	constructor(options: IdentityReconcilerOptions) {
		this.store = options.store;
		this.identityCache = options.identityCache;
		this.provisioningCache = options.provisioningCache;
		this.defaultRoles = options.defaultRoles ?? [Role.SUBMITTER];
		this.timeoutMs = options.timeoutMs;
		this.logger = options.logger.child({ component: 'IdentityReconciler' });
	}

	reconcileIdentity(user: AuthUser): ResultAsync<ReconcileOutcome, ReconcileError> {
		if (user.backingId !== undefined) {
			return this.reconcileExisting(user, user.backingId);
		}

		if (!user.isPrivileged) {
			this.logger.warn({ principal: user.principal }, 'Unknown user is not privileged, not creating identity');
			return okAsync<ReconcileOutcome, ReconcileError>({ status: 'rejected', reason: 'not_privileged' });
		}

		if (user.durableKey === undefined) {
			this.logger.warn({ principal: user.principal }, 'Privileged user has no durable key, not creating identity');
			return okAsync<ReconcileOutcome, ReconcileError>({ status: 'rejected', reason: 'missing_durable_key' });
		}

		return this.provision(user, user.durableKey);
	}

	private reconcileExisting(user: AuthUser, id: string): ResultAsync<ReconcileOutcome, ReconcileError> {
		return this.call(`readIdentity:${id}`, () => this.store.readIdentity(id), (cause) =>
			ReconcileErrors.readFailed(id, cause),
		)
			.andThen((identity): ResultAsync<Identity, ReconcileError> => {
				if (identity !== undefined) {
					return okAsync(identity);
				}
				this.logger.warn({ identityId: id, durableKey: user.durableKey }, 'Cached identity id has no record');
				if (user.durableKey !== undefined) {
					this.identityCache.invalidate(user.durableKey);
				}
				return errAsync(ReconcileErrors.missing(id));
			})
			.andThen((identity): ResultAsync<ReconcileOutcome, ReconcileError> => {
				const { changed, updated } = authoritativeDrift(identity, user);
				if (changed.length === 0) {
					this.logger.debug({ identityId: id }, 'Identity up to date');
					return okAsync<ReconcileOutcome, ReconcileError>({ status: 'unchanged', identity });
				}

				return this.call(`updateIdentity:${id}`, () => this.store.updateIdentity(updated), (cause) =>
					ReconcileErrors.updateFailed(id, cause),
				).map((): ReconcileOutcome => {
					this.logger.info({ identityId: id, changed }, 'Identity updated');
					return { status: 'updated', identity: updated };
				});
			});
	}

	private provision(user: AuthUser, durableKey: string): ResultAsync<ReconcileOutcome, ReconcileError> {
		const provisioned: { identity?: Identity } = {};

		const provisioning = this.provisioningCache.getOrCompute(
			durableKey,
			() => this.findOrCreate(user, durableKey, provisioned),
			{ timeoutMs: this.timeoutMs },
		);

		return ResultAsync.fromPromise(provisioning, (error) =>
			error instanceof TimeoutError ? ReconcileErrors.timeout(error) : ReconcileErrors.createFailed(durableKey, error),
		).andThen((id): ResultAsync<ReconcileOutcome, ReconcileError> => {
			this.identityCache.set(durableKey, id);
			if (provisioned.identity !== undefined) {
				this.logger.info({ identityId: id, durableKey }, 'Identity created');
				return okAsync<ReconcileOutcome, ReconcileError>({ status: 'created', identity: provisioned.identity });
			}
			return this.reconcileExisting({ ...user, backingId: id }, id);
		});
	}

	/**
	 * Re-check the store before creating; a record may have appeared since the
	 * resolver's lookup.
	 */
	private async findOrCreate(user: AuthUser, durableKey: string, provisioned: { identity?: Identity }): Promise<string> {
		const existingId = await this.store.findIdentityByKey(durableKey);
		if (existingId !== undefined) {
			this.logger.info({ identityId: existingId, durableKey }, 'Identity found');
			return existingId;
		}

		const record = newIdentityFor(user, this.defaultRoles);
		try {
			const id = await this.store.createIdentity(record);
			provisioned.identity = { ...record, id };
			return id;
		} catch (error) {
			if (!(error instanceof BackingStoreError) || error.code !== StoreErrorCodes.CONFLICT) {
				throw error;
			}
			// created elsewhere in the meantime
			const createdId = await this.store.findIdentityByKey(durableKey);
			if (createdId === undefined) {
				throw error;
			}
			return createdId;
		}
	}

	private call<T>(
		operation: string,
		fn: () => Promise<T>,
		onError: (cause: unknown) => ReconcileError,
	): ResultAsync<T, ReconcileError> {
		return ResultAsync.fromPromise(withTimeout(fn(), this.timeoutMs, operation), (error) =>
			error instanceof TimeoutError ? ReconcileErrors.timeout(error) : onError(error),
		);
	}
}
