import { createLogger } from '@gatehouse/logging';
import { createApp } from './app.js';
import { loadEnv } from './env.js';
import { createHeaderAttributeSource } from './identity/index.js';
import { createServices } from './services/index.js';

const env = loadEnv();

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'gatehouse',
	pretty: env.NODE_ENV === 'development',
});

const services = createServices(env, logger);
const app = await createApp({
	services,
	attributeSource: createHeaderAttributeSource({ trustHeaders: env.TRUST_ATTRIBUTE_HEADERS, logger }),
	logger,
});

if (!env.TRUST_ATTRIBUTE_HEADERS) {
	logger.warn('TRUST_ATTRIBUTE_HEADERS is off; every caller is treated as anonymous');
}

let shuttingDown = false;

async function shutdown(signal: string): Promise<void> {
	if (shuttingDown) {
		return;
	}
	shuttingDown = true;
	logger.info({ signal }, 'Shutting down');

	try {
		await app.close();
		await services.close();
		process.exit(0);
	} catch (error) {
		logger.error({ err: error }, 'Error during shutdown');
		process.exit(1);
	}
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

try {
	await app.listen({ port: env.PORT, host: env.HOST });
	logger.info({ port: env.PORT, host: env.HOST, backingStore: env.BACKING_STORE }, 'Gatehouse started');
} catch (error) {
	logger.error({ err: error }, 'Failed to start server');
	await services.close();
	process.exit(1);
}
