export { Role, isRole } from './role.js';
export { createAttributeSet, type AttributeSet, type AttributeSetInit } from './attribute-set.js';
export type { AuthUser } from './auth-user.js';
export {
	IDENTITY_ID_PREFIX,
	AUTHORITATIVE_FIELDS,
	generateIdentityId,
	newIdentityFor,
	authoritativeDrift,
	type Identity,
	type NewIdentity,
	type AuthoritativeField,
} from './identity.js';
export { SubjectRef, type IdentitySubject, type RoleSubject } from './subject-ref.js';
export { AccessMode, ACCESS_MODES, grantEntries, type AuthorizationGrants } from './authorization.js';
