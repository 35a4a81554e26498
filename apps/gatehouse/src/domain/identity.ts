/**
 * Identity
 *
 * Persisted person record owned by the backing store. One record per distinct
 * local key; the local key never changes once set.
 */

import { randomUUID } from 'node:crypto';
import type { AuthUser } from './auth-user.js';
import type { Role } from './role.js';

export interface Identity {
	/** Store-assigned id, "idn_<32 hex>" */
	readonly id: string;
	/** Durable key of the person; immutable once set */
	readonly localKey?: string;
	readonly username?: string;
	readonly displayName?: string;
	readonly email?: string;
	readonly institutionalId?: string;
	readonly roles: readonly Role[];
}

export type NewIdentity = Omit<Identity, 'id'>;

export const IDENTITY_ID_PREFIX = 'idn_';

/**
 * Generate a new identity id.
 */
export function generateIdentityId(): string {
	return `${IDENTITY_ID_PREFIX}${randomUUID().replaceAll('-', '')}`;
}

/**
 * Fields the sign-on layer is authoritative for.
 */
export const AUTHORITATIVE_FIELDS = ['username', 'email', 'displayName', 'institutionalId'] as const;

export type AuthoritativeField = (typeof AUTHORITATIVE_FIELDS)[number];

function authoritativeValues(user: AuthUser): Record<AuthoritativeField, string | undefined> {
	return {
		username: user.principal,
		email: user.email,
		displayName: user.displayName,
		institutionalId: user.institutionalId,
	};
}

/**
 * Record for a first-time identity.
 */
export function newIdentityFor(user: AuthUser, roles: readonly Role[]): NewIdentity {
	return {
		localKey: user.durableKey,
		...authoritativeValues(user),
		roles: [...roles],
	};
}

/**
 * Compare a stored identity with a freshly resolved user.
 *
 * Only authoritative fields are carried over; `localKey` and `roles` are kept
 * as stored.
 */
export function authoritativeDrift(
	identity: Identity,
	user: AuthUser,
): { readonly changed: readonly AuthoritativeField[]; readonly updated: Identity } {
	const fresh = authoritativeValues(user);
	const changed = AUTHORITATIVE_FIELDS.filter((field) => identity[field] !== fresh[field]);

	return {
		changed,
		updated: changed.length === 0 ? identity : { ...identity, ...fresh },
	};
}
