import { describe, it, expect, vi, afterEach } from 'vitest';
import { createApp } from '../app.js';
import { createHeaderAttributeSource } from '../identity/attribute-source.js';
import { BackingStoreError, StoreErrorCodes } from '../infrastructure/backing-store.js';
import { Role } from '../domain/index.js';
import { createTestServices, testLogger } from './helpers.js';

const facultyHeaders = {
	displayname: 'Jane Doe',
	mail: 'jdoe@d.edu',
	eppn: 'jdoe@d.edu',
	'unscoped-affiliation': 'member;FACULTY',
	affiliation: 'faculty@d.edu',
	employeenumber: '123',
};

type App = Awaited<ReturnType<typeof createApp>>;

describe('Gatehouse API', () => {
	let app: App | undefined;

	async function start(trustHeaders = true) {
		const services = createTestServices();
		app = await createApp({
			services,
			attributeSource: createHeaderAttributeSource({ trustHeaders, logger: testLogger }),
			logger: testLogger,
		});
		await app.ready();
		return { app, services };
	}

	afterEach(async () => {
		await app?.close();
		app = undefined;
	});

	it('GET /health returns UP', async () => {
		const { app } = await start();

		const res = await app.inject({ method: 'GET', url: '/health' });

		expect(res.statusCode).toBe(200);
		expect(res.json()).toEqual({ status: 'UP', timestamp: expect.any(String) });
	});

	describe('GET /user', () => {
		it('creates and returns the identity of a new privileged user', async () => {
			const { app, services } = await start();

			const res = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			expect(res.statusCode).toBe(200);
			expect(res.json()).toEqual({
				id: expect.stringMatching(/^idn_/),
				localKey: '123',
				username: 'jdoe@d.edu',
				displayName: 'Jane Doe',
				email: 'jdoe@d.edu',
				institutionalId: 'jdoe',
				roles: [Role.SUBMITTER],
			});
			expect(services.store.identityCount).toBe(1);
		});

		it('returns the same identity on repeat requests', async () => {
			const { app } = await start();

			const first = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });
			const second = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			expect(second.statusCode).toBe(200);
			expect(second.json()).toEqual(first.json());
		});

		it('omits unset identity fields', async () => {
			const { app, services } = await start();
			const id = await services.store.createIdentity({ localKey: '456', roles: [] });

			const res = await app.inject({ method: 'GET', url: '/user', headers: { employeenumber: '456' } });

			expect(res.statusCode).toBe(200);
			expect(res.json()).toEqual({ id, localKey: '456', roles: [] });
		});

		it('updates a drifted email', async () => {
			const { app } = await start();
			await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			const res = await app.inject({
				method: 'GET',
				url: '/user',
				headers: { ...facultyHeaders, mail: 'jane.doe@d.edu' },
			});

			expect(res.statusCode).toBe(200);
			expect(res.json()).toMatchObject({ localKey: '123', email: 'jane.doe@d.edu' });
		});

		it('answers 401 for an unknown user without the privileged affiliation', async () => {
			const { app, services } = await start();

			const res = await app.inject({
				method: 'GET',
				url: '/user',
				headers: { ...facultyHeaders, 'unscoped-affiliation': 'member;staff' },
			});

			expect(res.statusCode).toBe(401);
			expect(res.json()).toEqual({
				code: 'NOT_AUTHORIZED',
				message: 'User is not authorized to use this repository',
			});
			expect(services.store.identityCount).toBe(0);
		});

		it('answers 401 when attribute headers are not trusted', async () => {
			const { app } = await start(false);

			const res = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			expect(res.statusCode).toBe(401);
		});

		it('answers 500 when a cached identity id has no record', async () => {
			const { app, services } = await start();
			services.identityCache.set('123', 'idn_gone');

			const res = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			expect(res.statusCode).toBe(500);
			expect(res.json()).toEqual({
				code: 'IDENTITY_MISSING',
				message: "No identity record for id 'idn_gone'",
			});
		});

		it('answers 503 when the identity cannot be created', async () => {
			const { app, services } = await start();
			vi.spyOn(services.store, 'createIdentity').mockRejectedValueOnce(
				new BackingStoreError(StoreErrorCodes.UNAVAILABLE, 'createIdentity', 'connection reset'),
			);

			const res = await app.inject({ method: 'GET', url: '/user', headers: facultyHeaders });

			expect(res.statusCode).toBe(503);
			expect(res.json()).toEqual({
				code: 'STORE_UNAVAILABLE',
				message: 'Identity could not be reconciled (identity_create_failed)',
			});
		});
	});
});
