/**
 * Attribute Set
 *
 * Verified identity attributes for one request, as asserted by the federated
 * sign-on layer. Absent attributes are undefined; nothing here is validated
 * beyond trimming.
 */

export interface AttributeSet {
	/** "First Last" */
	readonly displayName?: string;
	/** Preferred email address */
	readonly email?: string;
	/** Scoped principal name, "identity@domain" */
	readonly principal?: string;
	/** Stable person identifier that survives principal and email changes */
	readonly durableKey?: string;
	/** Unscoped affiliation, role or status tokens, e.g. "FACULTY" */
	readonly affiliations: ReadonlySet<string>;
	/** Scoped affiliation tokens, e.g. "FACULTY@example.edu" */
	readonly scopedAffiliations: ReadonlySet<string>;
}

/**
 * Input accepted by {@link createAttributeSet}.
 */
export interface AttributeSetInit {
	displayName?: string;
	email?: string;
	principal?: string;
	durableKey?: string;
	affiliations?: Iterable<string>;
	scopedAffiliations?: Iterable<string>;
}

function present(value: string | undefined): string | undefined {
	return value === undefined || value.trim() === '' ? undefined : value;
}

/**
 * Build an attribute set; blank strings count as absent.
 */
export function createAttributeSet(init: AttributeSetInit = {}): AttributeSet {
	return {
		displayName: present(init.displayName),
		email: present(init.email),
		principal: present(init.principal),
		durableKey: present(init.durableKey),
		affiliations: new Set(init.affiliations ?? []),
		scopedAffiliations: new Set(init.scopedAffiliations ?? []),
	};
}
