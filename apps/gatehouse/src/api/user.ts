/**
 * GET /user
 *
 * Resolves the caller from its sign-on attributes, reconciles the stored
 * identity and returns it. Unknown callers without the privileged
 * affiliation get a 401.
 */

import type { FastifyPluginAsync } from 'fastify';
import type { Identity } from '../domain/index.js';
import type { AttributeSource, ReconcileError, RejectReason } from '../identity/index.js';
import { ErrorResponseSchema, IdentityResponseSchema, type ErrorResponse, type IdentityResponse } from './schemas.js';

export interface UserRoutesOptions {
	attributeSource: AttributeSource;
}

const REJECTION_MESSAGES: Record<RejectReason, string> = {
	not_privileged: 'User is not authorized to use this repository',
	missing_durable_key: 'User has no durable identifier and cannot be provisioned',
};

export function toIdentityResponse(identity: Identity): IdentityResponse {
	return {
		id: identity.id,
		localKey: identity.localKey,
		username: identity.username,
		displayName: identity.displayName,
		email: identity.email,
		institutionalId: identity.institutionalId,
		roles: [...identity.roles],
	};
}

export function reconcileErrorResponse(error: ReconcileError): { status: 500 | 503 | 504; body: ErrorResponse } {
	switch (error.type) {
		case 'identity_missing':
			return {
				status: 500,
				body: { code: 'IDENTITY_MISSING', message: `No identity record for id '${error.identityId}'` },
			};
		case 'timeout':
			return {
				status: 504,
				body: { code: 'TIMEOUT', message: `Operation '${error.operation}' timed out after ${error.durationMs}ms` },
			};
		case 'identity_read_failed':
		case 'identity_create_failed':
		case 'identity_update_failed':
			return {
				status: 503,
				body: { code: 'STORE_UNAVAILABLE', message: `Identity could not be reconciled (${error.type})` },
			};
	}
}

export const userRoutes: FastifyPluginAsync<UserRoutesOptions> = async (fastify, opts) => {
	fastify.get(
		'/user',
		{
			schema: {
				response: {
					200: IdentityResponseSchema,
					401: ErrorResponseSchema,
					500: ErrorResponseSchema,
					503: ErrorResponseSchema,
					504: ErrorResponseSchema,
				},
			},
		},
		async (request, reply) => {
			const { resolver, reconciler } = request.services;
			const user = await resolver.resolve(opts.attributeSource(request.headers));
			const result = await reconciler.reconcileIdentity(user);

			return result.match(
				(outcome) => {
					if (outcome.status === 'rejected') {
						const body: ErrorResponse = { code: 'NOT_AUTHORIZED', message: REJECTION_MESSAGES[outcome.reason] };
						return reply.status(401).send(body);
					}
					return reply.send(toIdentityResponse(outcome.identity));
				},
				(error) => {
					const { status, body } = reconcileErrorResponse(error);
					request.log.error({ error: error.type, principal: user.principal, status }, 'Identity reconciliation failed');
					return reply.status(status).send(body);
				},
			);
		},
	);
};
