import Fastify from 'fastify';
import type { Logger } from '@gatehouse/logging';
import { healthRoutes } from './api/health.js';
import { userRoutes } from './api/user.js';
import { errorHandlerPlugin } from './plugins/error-handler.js';
import { servicesPlugin } from './plugins/services-plugin.js';
import type { AttributeSource } from './identity/index.js';
import type { Services } from './services/index.js';

export interface CreateAppOptions {
	services: Services;
	attributeSource: AttributeSource;
	logger: Logger;
}

/**
 * Create the Fastify application with all routes
 */
export async function createApp(options: CreateAppOptions) {
	const app = Fastify({ loggerInstance: options.logger });

	await app.register(errorHandlerPlugin);
	await app.register(servicesPlugin, { services: options.services });

	await app.register(healthRoutes);
	await app.register(userRoutes, { attributeSource: options.attributeSource });

	return app;
}
