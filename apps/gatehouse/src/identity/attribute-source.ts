/**
 * Header Attribute Source
 *
 * Maps the attribute headers set by the sign-on layer onto an
 * {@link AttributeSet}. Whether those headers can be trusted is decided by the
 * transport in front of this service; with `trustHeaders` off nothing is read.
 */

import type { IncomingHttpHeaders } from 'node:http';
import type { Logger } from '@gatehouse/logging';
import { createAttributeSet, type AttributeSet } from '../domain/index.js';

export const AttributeHeaders = {
	DISPLAY_NAME: 'displayname',
	EMAIL: 'mail',
	PRINCIPAL: 'eppn',
	AFFILIATIONS: 'unscoped-affiliation',
	SCOPED_AFFILIATIONS: 'affiliation',
	DURABLE_KEY: 'employeenumber',
} as const;

const MULTI_VALUE_SEPARATOR = ';';

export type AttributeSource = (headers: IncomingHttpHeaders) => AttributeSet;

export interface HeaderAttributeSourceOptions {
	trustHeaders: boolean;
	logger: Logger;
}

function single(headers: IncomingHttpHeaders, name: string): string | undefined {
	const value = headers[name];
	return Array.isArray(value) ? value[0] : value;
}

function multi(headers: IncomingHttpHeaders, name: string): string[] {
	const value = headers[name];
	const raw = Array.isArray(value) ? value.join(MULTI_VALUE_SEPARATOR) : (value ?? '');
	return raw
		.split(MULTI_VALUE_SEPARATOR)
		.map((token) => token.trim())
		.filter((token) => token !== '');
}

export function createHeaderAttributeSource(options: HeaderAttributeSourceOptions): AttributeSource {
	const log = options.logger.child({ component: 'HeaderAttributeSource' });

	return (headers) => {
		if (!options.trustHeaders) {
			return createAttributeSet();
		}

		log.debug({ headers }, 'Attribute headers');

		return createAttributeSet({
			displayName: single(headers, AttributeHeaders.DISPLAY_NAME),
			email: single(headers, AttributeHeaders.EMAIL),
			principal: single(headers, AttributeHeaders.PRINCIPAL),
			durableKey: single(headers, AttributeHeaders.DURABLE_KEY),
			affiliations: multi(headers, AttributeHeaders.AFFILIATIONS),
			scopedAffiliations: multi(headers, AttributeHeaders.SCOPED_AFFILIATIONS),
		});
	};
}
