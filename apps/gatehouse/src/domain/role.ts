/**
 * Repository roles an identity can hold.
 */
export const Role = {
	/** May deposit and manage submissions */
	SUBMITTER: 'SUBMITTER',
	/** Repository administrator */
	ADMIN: 'ADMIN',
} as const;

export type Role = (typeof Role)[keyof typeof Role];

const ROLES: ReadonlySet<string> = new Set(Object.values(Role));

export function isRole(value: string): value is Role {
	return ROLES.has(value);
}
