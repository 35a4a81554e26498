/**
 * Identity Resolver
 *
 * Derives the per-request {@link AuthUser} from verified attributes and links
 * it to a stored identity through the shared lookup cache. Lookup failures
 * degrade to an unlinked user; `resolve` never rejects.
 */

import type { Logger } from '@gatehouse/logging';
import type { MemoizingCache } from '@gatehouse/memo-cache';
import type { AttributeSet, AuthUser } from '../domain/index.js';
import type { IdentityStore } from '../infrastructure/backing-store.js';

/**
 * Durable key to stored identity id; undefined when no record exists.
 */
export type IdentityLookupCache = MemoizingCache<string, string | undefined>;

export interface IdentityResolverOptions {
	store: Pick<IdentityStore, 'findIdentityByKey'>;
	cache: IdentityLookupCache;
	/** Affiliation token that marks a privileged user, matched case-insensitively */
	privilegedAffiliation: string;
	lookupTimeoutMs?: number;
	logger: Logger;
}

/**
 * Domain part of a `name@domain` token: the text between the first and second
 * '@', so `a@b@c` yields `b`.
 */
function domainOf(token: string): string | undefined {
	return token.split('@')[1];
}

function trimmed(value: string | undefined): string | undefined {
	const result = value?.trim();
	return result === '' ? undefined : result;
}

export class IdentityResolver {
	private readonly store: Pick<IdentityStore, 'findIdentityByKey'>;
	private readonly cache: IdentityLookupCache;
	private readonly privilegedAffiliation: string;
	private readonly lookupTimeoutMs: number | undefined;
	private readonly logger: Logger;

	constructor(options: IdentityResolverOptions) {
		this.store = options.store;
		this.cache = options.cache;
		this.privilegedAffiliation = options.privilegedAffiliation.trim().toLowerCase();
		this.lookupTimeoutMs = options.lookupTimeoutMs;
		this.logger = options.logger.child({ component: 'IdentityResolver' });
	}

	async resolve(attrs: AttributeSet): Promise<AuthUser> {
		const principal = trimmed(attrs.principal);
		const durableKey = trimmed(attrs.durableKey);

		const user = {
			displayName: trimmed(attrs.displayName),
			email: trimmed(attrs.email),
			principal,
			institutionalId: principal === undefined ? undefined : principal.split('@')[0]?.toLowerCase(),
			durableKey,
			domains: this.domainsOf(principal, attrs.scopedAffiliations),
			isPrivileged: this.isPrivileged(attrs.affiliations),
		};

		if (durableKey === undefined) {
			this.logger.debug({ principal }, 'No durable key, skipping identity lookup');
			return { ...user, lookupFailed: false };
		}

		this.logger.debug({ durableKey }, 'Looking up identity');
		try {
			const backingId = await this.cache.getOrCompute(durableKey, () => this.store.findIdentityByKey(durableKey), {
				timeoutMs: this.lookupTimeoutMs,
			});
			this.logger.debug({ durableKey, backingId }, 'Identity lookup complete');
			return { ...user, backingId, lookupFailed: false };
		} catch (error) {
			this.logger.warn({ durableKey, err: error }, 'Identity lookup failed');
			return { ...user, lookupFailed: true };
		}
	}

	private isPrivileged(affiliations: Iterable<string>): boolean {
		for (const affiliation of affiliations) {
			if (affiliation.trim().toLowerCase() === this.privilegedAffiliation) {
				return true;
			}
		}
		return false;
	}

	private domainsOf(principal: string | undefined, scopedAffiliations: Iterable<string>): Set<string> {
		const domains = new Set<string>();
		for (const token of [principal ?? '', ...scopedAffiliations]) {
			const domain = domainOf(token.trim());
			if (domain) {
				domains.add(domain);
			}
		}
		return domains;
	}
}
