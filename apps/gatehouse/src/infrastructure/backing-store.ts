/**
 * Backing Store
 *
 * Repository operations the identity and authorization flows depend on.
 * Every operation fails with {@link BackingStoreError}.
 */

import type { AuthorizationGrants, Identity, NewIdentity } from '../domain/index.js';

export interface IdentityStore {
	/** Id of the identity whose local key equals `localKey`, if any */
	findIdentityByKey(localKey: string): Promise<string | undefined>;

	/** Persist a new identity and return its assigned id */
	createIdentity(identity: NewIdentity): Promise<string>;

	readIdentity(id: string): Promise<Identity | undefined>;

	/**
	 * Overwrite the authoritative fields and roles of an existing identity.
	 * The stored local key is kept.
	 */
	updateIdentity(identity: Identity): Promise<void>;
}

export interface AuthorizationStore {
	/**
	 * Replace the subject set of every mode present in `grants`, all or none.
	 */
	writeAuthorization(resourceId: string, grants: AuthorizationGrants): Promise<void>;

	readAuthorizations(resourceId: string): Promise<AuthorizationGrants>;
}

export interface BackingStore extends IdentityStore, AuthorizationStore {
	close(): Promise<void>;
}

export const StoreErrorCodes = {
	UNAVAILABLE: 'E_STORE_UNAVAILABLE',
	CONFLICT: 'E_STORE_CONFLICT',
	NOT_FOUND: 'E_STORE_NOT_FOUND',
	REJECTED: 'E_STORE_REJECTED',
} as const;

export type StoreErrorCode = (typeof StoreErrorCodes)[keyof typeof StoreErrorCodes];

export class BackingStoreError extends Error {
	readonly code: StoreErrorCode;
	readonly operation: string;

	constructor(code: StoreErrorCode, operation: string, message: string, options?: { cause?: unknown }) {
		super(`${operation}: ${message}`, options);
		this.name = 'BackingStoreError';
		this.code = code;
		this.operation = operation;
	}
}
