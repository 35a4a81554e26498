/**
 * Error Handler
 *
 * Maps errors thrown out of route handlers to `{ code, message }` responses.
 * Request errors keep their status; cache timeouts become 504 and backing
 * store failures 503. Anything else is a 500.
 */

import type { FastifyError, FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { TimeoutError } from '@gatehouse/memo-cache';
import { BackingStoreError } from '../infrastructure/backing-store.js';
import type { ErrorResponse } from '../api/schemas.js';

/**
 * Status and body for an error, or undefined if unrecognised.
 */
export function mapKnownError(error: Error): { status: number; body: ErrorResponse } | undefined {
	if (error instanceof TimeoutError) {
		return { status: 504, body: { code: 'TIMEOUT', message: error.message } };
	}
	if (error instanceof BackingStoreError) {
		return { status: 503, body: { code: 'STORE_UNAVAILABLE', message: 'Backing store unavailable' } };
	}
	return undefined;
}

const errorHandlerPluginAsync: FastifyPluginAsync = async (fastify) => {
	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const statusCode = error.statusCode ?? 500;

		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		const mapped = mapKnownError(error);
		if (mapped) {
			request.log.error({ error: error.name, message: error.message, status: mapped.status }, 'Mapped error');
			return reply.status(mapped.status).send(mapped.body);
		}

		request.log.error({ error: error.name, message: error.message, stack: error.stack }, 'Unhandled error');
		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
		};
		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: 'gatehouse-error-handler',
	fastify: '5.x',
});
