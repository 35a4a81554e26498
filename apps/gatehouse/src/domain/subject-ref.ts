/**
 * Subject Reference
 *
 * Anything an authorization can name: a single identity, or every identity
 * holding a role within a domain.
 */

import type { Role } from './role.js';

export interface IdentitySubject {
	readonly kind: 'identity';
	readonly id: string;
}

export interface RoleSubject {
	readonly kind: 'role';
	readonly domain: string;
	readonly role: Role;
}

export type SubjectRef = IdentitySubject | RoleSubject;

export const SubjectRef = {
	identity(id: string): IdentitySubject {
		return { kind: 'identity', id };
	},

	roleAtDomain(domain: string, role: Role): RoleSubject {
		return { kind: 'role', domain, role };
	},
};
