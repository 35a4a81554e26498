import { createSilentLogger } from '@gatehouse/logging';
import { createAttributeSet, type AttributeSet, type AttributeSetInit } from '../domain/index.js';
import { loadEnv } from '../env.js';
import { InMemoryBackingStore } from '../infrastructure/memory/in-memory-backing-store.js';
import { createServices } from '../services/index.js';

export const testLogger = createSilentLogger();

/**
 * Attributes of a privileged user with durable key "123".
 */
export function facultyAttributes(overrides: AttributeSetInit = {}): AttributeSet {
	return createAttributeSet({
		displayName: 'Jane Doe',
		email: 'jdoe@d.edu',
		principal: 'jdoe@d.edu',
		durableKey: '123',
		affiliations: ['FACULTY'],
		scopedAffiliations: ['FACULTY@d.edu'],
		...overrides,
	});
}

export function createTestServices(env: Record<string, string> = {}) {
	const store = new InMemoryBackingStore();
	const services = createServices(loadEnv(env), testLogger, { store });
	return { ...services, store };
}

/**
 * Promise that never settles, for timeout tests.
 */
export function never<T>(): Promise<T> {
	return new Promise<T>(() => undefined);
}
