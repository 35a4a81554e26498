/**
 * Authorization
 *
 * A protected resource carries one subject set per access mode. Subjects are
 * stored as tokens produced by the role grant resolver.
 */

export const AccessMode = {
	READ: 'read',
	WRITE: 'write',
} as const;

export type AccessMode = (typeof AccessMode)[keyof typeof AccessMode];

export const ACCESS_MODES: readonly AccessMode[] = [AccessMode.READ, AccessMode.WRITE];

/**
 * Subject tokens per mode. A missing mode means "not part of this write" on
 * the way in and "no authorization" on the way out.
 */
export type AuthorizationGrants = Partial<Record<AccessMode, readonly string[]>>;

/**
 * Modes present in `grants`, in canonical order, with their subjects.
 */
export function grantEntries(grants: AuthorizationGrants): Array<[AccessMode, readonly string[]]> {
	const entries: Array<[AccessMode, readonly string[]]> = [];
	for (const mode of ACCESS_MODES) {
		const subjects = grants[mode];
		if (subjects !== undefined) {
			entries.push([mode, subjects]);
		}
	}
	return entries;
}
