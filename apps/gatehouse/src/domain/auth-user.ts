/**
 * Auth User
 *
 * Per-request view of the caller derived from an {@link AttributeSet}. Never
 * persisted; used to reconcile the stored identity record.
 */
export interface AuthUser {
	readonly displayName?: string;
	readonly email?: string;
	/** Scoped principal name; becomes the identity's username */
	readonly principal?: string;
	/** Lower-cased local part of the principal */
	readonly institutionalId?: string;
	readonly durableKey?: string;
	/** Domains of the principal and of every scoped affiliation */
	readonly domains: ReadonlySet<string>;
	/** Holds the privileged affiliation */
	readonly isPrivileged: boolean;
	/** Id of the matching stored identity, when one was found */
	readonly backingId?: string;
	/** The identity lookup failed, so an unset backingId means "unknown", not "absent" */
	readonly lookupFailed: boolean;
}
