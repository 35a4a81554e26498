/**
 * Authorization Composer
 *
 * Stages per-mode subject sets for one resource and commits them in a single
 * backing-store write. Staging never performs I/O.
 *
 * @example
 * ```typescript
 * await composer
 *     .forResource(resourceId)
 *     .grantRead([SubjectRef.identity(ownerId)])
 *     .grantWrite([SubjectRef.identity(ownerId), roleGrants.subjectFor(domain, Role.SUBMITTER)])
 *     .commit();
 * ```
 */

import { ResultAsync, okAsync } from 'neverthrow';
import type { Logger } from '@gatehouse/logging';
import { withTimeout } from '@gatehouse/memo-cache';
import { AccessMode, ACCESS_MODES, type AuthorizationGrants, type SubjectRef } from '../domain/index.js';
import type { AuthorizationStore } from '../infrastructure/backing-store.js';
import type { RoleGrantResolver } from './role-grant-resolver.js';
import { GrantErrors, type GrantReadError, type GrantWriteError } from './errors.js';

export interface AuthorizationComposerOptions {
	store: AuthorizationStore;
	roleGrants: RoleGrantResolver;
	/** Bound on each commit or read */
	writeTimeoutMs?: number;
	logger: Logger;
}

export class AuthorizationComposer {
	private readonly store: AuthorizationStore;
	private readonly roleGrants: RoleGrantResolver;
	private readonly writeTimeoutMs: number | undefined;
	private readonly logger: Logger;

	constructor(options: AuthorizationComposerOptions) {
		this.store = options.store;
		this.roleGrants = options.roleGrants;
		this.writeTimeoutMs = options.writeTimeoutMs;
		this.logger = options.logger.child({ component: 'AuthorizationComposer' });
	}

	/**
	 * Start staging grants for a resource.
	 */
	forResource(resourceId: string): AuthorizationBuilder {
		if (resourceId.trim() === '') {
			throw new RangeError('Resource id must not be blank');
		}
		return new AuthorizationBuilder(resourceId, this.roleGrants, (grants, modes) => this.write(resourceId, grants, modes));
	}

	/**
	 * Current subject tokens per mode, for callers extending an existing grant.
	 */
	read(resourceId: string): ResultAsync<AuthorizationGrants, GrantReadError> {
		return ResultAsync.fromPromise(
			withTimeout(this.store.readAuthorizations(resourceId), this.writeTimeoutMs, `readAuthorizations:${resourceId}`),
			(error) => GrantErrors.readFailed(resourceId, error),
		);
	}

	private write(
		resourceId: string,
		grants: AuthorizationGrants,
		modes: readonly AccessMode[],
	): ResultAsync<void, GrantWriteError> {
		return ResultAsync.fromPromise(
			withTimeout(
				this.store.writeAuthorization(resourceId, grants),
				this.writeTimeoutMs,
				`writeAuthorization:${resourceId}`,
			),
			(error) => GrantErrors.writeFailed(resourceId, modes, error),
		)
			.map(() => {
				this.logger.info({ resourceId, modes }, 'Authorizations committed');
			})
			.mapErr((error) => {
				this.logger.warn({ resourceId, modes, error: error.type }, 'Authorization commit failed');
				return error;
			});
	}
}

type CommitFn = (grants: AuthorizationGrants, modes: readonly AccessMode[]) => ResultAsync<void, GrantWriteError>;

/**
 * Mutable staging for one resource, returned by
 * {@link AuthorizationComposer.forResource}.
 */
export class AuthorizationBuilder {
	private readonly staging = new Map<AccessMode, string[]>();

	constructor(
		readonly resourceId: string,
		private readonly roleGrants: RoleGrantResolver,
		private readonly commitFn: CommitFn,
	) {}

	grantRead(subjects: Iterable<SubjectRef>): this {
		return this.grant(AccessMode.READ, subjects);
	}

	grantWrite(subjects: Iterable<SubjectRef>): this {
		return this.grant(AccessMode.WRITE, subjects);
	}

	/**
	 * Stage the full subject set for `mode`, replacing any earlier staging of
	 * that mode. Duplicate subjects collapse to their first occurrence.
	 */
	grant(mode: AccessMode, subjects: Iterable<SubjectRef>): this {
		const tokens = new Set<string>();
		for (const subject of subjects) {
			tokens.add(this.roleGrants.tokenFor(subject));
		}
		this.staging.set(mode, [...tokens]);
		return this;
	}

	stagedModes(): AccessMode[] {
		return ACCESS_MODES.filter((mode) => this.staging.has(mode));
	}

	staged(): AuthorizationGrants {
		const grants: AuthorizationGrants = {};
		for (const mode of this.stagedModes()) {
			grants[mode] = [...(this.staging.get(mode) ?? [])];
		}
		return grants;
	}

	/**
	 * Write every staged mode at once. Succeeds without I/O when nothing is
	 * staged.
	 */
	commit(): ResultAsync<void, GrantWriteError> {
		const modes = this.stagedModes();
		if (modes.length === 0) {
			return okAsync(undefined);
		}
		return this.commitFn(this.staged(), modes);
	}
}
