/**
 * In-Memory Backing Store
 *
 * Embedded store for development mode and tests. Records are copied on the
 * way in and out so callers never share mutable state with the store.
 */

import {
	generateIdentityId,
	grantEntries,
	type AccessMode,
	type AuthorizationGrants,
	type Identity,
	type NewIdentity,
} from '../../domain/index.js';
import { BackingStoreError, StoreErrorCodes, type BackingStore } from '../backing-store.js';

export interface InMemoryBackingStoreOptions {
	/** Id generator, defaults to {@link generateIdentityId} */
	generateId?: () => string;
}

function copyIdentity(identity: Identity): Identity {
	return { ...identity, roles: [...identity.roles] };
}

export class InMemoryBackingStore implements BackingStore {
	private readonly identities = new Map<string, Identity>();
	private readonly idsByLocalKey = new Map<string, string>();
	private readonly authorizations = new Map<string, Map<AccessMode, readonly string[]>>();
	private readonly generateId: () => string;

	constructor(options: InMemoryBackingStoreOptions = {}) {
		this.generateId = options.generateId ?? generateIdentityId;
	}

	async findIdentityByKey(localKey: string): Promise<string | undefined> {
		return this.idsByLocalKey.get(localKey);
	}

	async createIdentity(identity: NewIdentity): Promise<string> {
		const { localKey } = identity;
		if (localKey !== undefined && this.idsByLocalKey.has(localKey)) {
			throw new BackingStoreError(
				StoreErrorCodes.CONFLICT,
				'createIdentity',
				`an identity with local key '${localKey}' already exists`,
			);
		}

		const id = this.generateId();
		this.identities.set(id, copyIdentity({ ...identity, id }));
		if (localKey !== undefined) {
			this.idsByLocalKey.set(localKey, id);
		}
		return id;
	}

	async readIdentity(id: string): Promise<Identity | undefined> {
		const identity = this.identities.get(id);
		return identity === undefined ? undefined : copyIdentity(identity);
	}

	async updateIdentity(identity: Identity): Promise<void> {
		const existing = this.identities.get(identity.id);
		if (existing === undefined) {
			throw new BackingStoreError(StoreErrorCodes.NOT_FOUND, 'updateIdentity', `identity '${identity.id}' not found`);
		}
		this.identities.set(identity.id, copyIdentity({ ...identity, localKey: existing.localKey }));
	}

	async writeAuthorization(resourceId: string, grants: AuthorizationGrants): Promise<void> {
		const modes = new Map(this.authorizations.get(resourceId));
		for (const [mode, subjects] of grantEntries(grants)) {
			modes.set(mode, [...subjects]);
		}
		this.authorizations.set(resourceId, modes);
	}

	async readAuthorizations(resourceId: string): Promise<AuthorizationGrants> {
		const grants: AuthorizationGrants = {};
		for (const [mode, subjects] of this.authorizations.get(resourceId) ?? []) {
			grants[mode] = [...subjects];
		}
		return grants;
	}

	/** Number of stored identities */
	get identityCount(): number {
		return this.identities.size;
	}

	async close(): Promise<void> {
		// nothing held open
	}
}
