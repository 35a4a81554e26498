import type { FastifyPluginAsync } from 'fastify';
import { HealthResponseSchema } from './schemas.js';

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
	fastify.get(
		'/health',
		{
			schema: {
				response: { 200: HealthResponseSchema },
			},
		},
		() => ({ status: 'UP', timestamp: new Date().toISOString() }),
	);
};
