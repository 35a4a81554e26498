/**
 * Role Grant Resolver
 *
 * Turns subject references into the tokens stored in authorizations and back.
 * This is the only place a {@link SubjectRef} becomes a comparable value, so
 * the grant writer and a permission evaluator agree on subjects without a
 * shared lookup.
 *
 * Token forms (each segment percent-encoded, so `:` never appears inside one;
 * a lone surrogate, which has no UTF-8 form, is written as `%uXXXX`):
 *
 *   <namespace>:identity:<id>
 *   <namespace>:role:<domain>:<role>
 */

import { SubjectRef, isRole, type Role, type RoleSubject } from '../domain/index.js';

export const DEFAULT_SUBJECT_NAMESPACE = 'urn:gatehouse';

export interface RoleGrantResolverOptions {
	/** Token prefix; must be non-blank and must not end with ':' */
	namespace?: string;
}

function isLoneSurrogate(char: string): boolean {
	const unit = char.charCodeAt(0);
	return char.length === 1 && unit >= 0xd800 && unit <= 0xdfff;
}

function enc(value: string): string {
	let encoded = '';
	// iterating by code point yields unpaired surrogates as single units
	for (const char of value) {
		encoded += isLoneSurrogate(char) ? `%u${char.charCodeAt(0).toString(16).toUpperCase()}` : encodeURIComponent(char);
	}
	return encoded;
}

const SURROGATE_ESCAPE = /(%u[0-9A-F]{4})/;

function decodeSegment(segment: string): string | undefined {
	let decoded = '';
	try {
		// split with a capture group puts the escapes at odd indexes
		segment.split(SURROGATE_ESCAPE).forEach((piece, index) => {
			decoded += index % 2 === 1 ? String.fromCharCode(Number.parseInt(piece.slice(2), 16)) : decodeURIComponent(piece);
		});
	} catch (error) {
		if (error instanceof URIError) {
			return undefined;
		}
		throw error;
	}
	// only the canonical encoding parses, keeping parse the exact inverse of tokenFor
	return enc(decoded) === segment ? decoded : undefined;
}

export class RoleGrantResolver {
	readonly namespace: string;
	private readonly prefix: string;

	constructor(options: RoleGrantResolverOptions = {}) {
		const namespace = options.namespace ?? DEFAULT_SUBJECT_NAMESPACE;
		if (namespace.trim() === '' || namespace.endsWith(':')) {
			throw new RangeError(`Invalid subject namespace '${namespace}'`);
		}
		this.namespace = namespace;
		this.prefix = `${namespace}:`;
	}

	subjectFor(domain: string, role: Role): RoleSubject {
		return SubjectRef.roleAtDomain(domain, role);
	}

	tokenFor(ref: SubjectRef): string {
		switch (ref.kind) {
			case 'identity':
				return `${this.prefix}identity:${enc(ref.id)}`;
			case 'role':
				return `${this.prefix}role:${enc(ref.domain)}:${enc(ref.role)}`;
		}
	}

	/**
	 * Inverse of {@link tokenFor}. Tokens from another namespace or in a
	 * non-canonical form yield undefined.
	 */
	parseToken(token: string): SubjectRef | undefined {
		if (!token.startsWith(this.prefix)) {
			return undefined;
		}
		const [kind, ...rest] = token.slice(this.prefix.length).split(':');

		if (kind === 'identity' && rest.length === 1 && rest[0] !== undefined) {
			const id = decodeSegment(rest[0]);
			return id === undefined ? undefined : SubjectRef.identity(id);
		}

		if (kind === 'role' && rest.length === 2 && rest[0] !== undefined && rest[1] !== undefined) {
			const domain = decodeSegment(rest[0]);
			const role = decodeSegment(rest[1]);
			if (domain === undefined || role === undefined || !isRole(role)) {
				return undefined;
			}
			return SubjectRef.roleAtDomain(domain, role);
		}

		return undefined;
	}

	/**
	 * Every token a principal holds: its identity token (when linked) plus one
	 * role token per domain and role.
	 */
	heldSubjects(identityId: string | undefined, domains: Iterable<string>, roles: Iterable<Role>): string[] {
		const tokens = new Set<string>();
		if (identityId !== undefined) {
			tokens.add(this.tokenFor(SubjectRef.identity(identityId)));
		}
		const roleList = [...roles];
		for (const domain of domains) {
			for (const role of roleList) {
				tokens.add(this.tokenFor(this.subjectFor(domain, role)));
			}
		}
		return [...tokens];
	}
}
