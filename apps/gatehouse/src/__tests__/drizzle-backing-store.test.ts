import { describe, it, expect, vi } from 'vitest';
import { sql } from 'drizzle-orm';
import { drizzle, type PgRemoteQueryResultHKT } from 'drizzle-orm/pg-proxy';
import type { TransactionContext, TransactionManager } from '@gatehouse/persistence';
import { Role } from '../domain/index.js';
import { BackingStoreError, StoreErrorCodes } from '../infrastructure/backing-store.js';
import { createDrizzleBackingStore } from '../infrastructure/persistence/drizzle-backing-store.js';
import { testLogger } from './helpers.js';

interface Statement {
	readonly sql: string;
	readonly params: readonly unknown[];
}

type Responder = (statement: Statement) => unknown[][];

/**
 * Drizzle over an in-process callback: every statement is recorded and
 * answered by `respond` with rows in column order.
 */
function recordingDatabase(respond: Responder = () => []) {
	const statements: Statement[] = [];
	const db = drizzle(async (query, params) => {
		const statement: Statement = { sql: query, params };
		statements.push(statement);
		return { rows: respond(statement) };
	});

	const transactions: TransactionManager<PgRemoteQueryResultHKT> = {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext<PgRemoteQueryResultHKT>) => Promise<T>): Promise<T> {
			await db.execute(sql`begin`);
			try {
				const result = await fn({ db });
				await db.execute(sql`commit`);
				return result;
			} catch (error) {
				await db.execute(sql`rollback`);
				throw error;
			}
		},
	};

	const onClose = vi.fn(async () => undefined);
	const store = createDrizzleBackingStore(db, { transactions, logger: testLogger, onClose });
	const verbs = () => statements.map((statement) => statement.sql.split(' ')[0]);
	const find = (prefix: string) => statements.find((statement) => statement.sql.startsWith(prefix));

	return { store, statements, verbs, find, onClose };
}

function pgError(code: string, message: string): Error {
	return Object.assign(new Error(message), { code });
}

const identity = {
	localKey: '123',
	username: 'jdoe',
	displayName: 'Jane Doe',
	email: 'jdoe@d.edu',
	institutionalId: 'jdoe',
	roles: [Role.SUBMITTER],
};

describe('DrizzleBackingStore', () => {
	describe('writeAuthorization', () => {
		it('should replace every staged mode with one delete and one insert in a transaction', async () => {
			const { store, verbs, find } = recordingDatabase();

			await store.writeAuthorization('R', { read: ['u1'], write: ['u1', 'u2', 'u1'] });

			expect(verbs()).toEqual(['begin', 'delete', 'insert', 'commit']);
			expect(find('delete')?.params).toEqual(['R', 'read', 'write']);
			expect(find('insert')?.params).toEqual(['R', 'read', 'u1', 'R', 'write', 'u1', 'R', 'write', 'u2']);
		});

		it('should only delete the modes that are staged', async () => {
			const { store, find } = recordingDatabase();

			await store.writeAuthorization('R', { write: ['u2'] });

			expect(find('delete')?.params).toEqual(['R', 'write']);
		});

		it('should clear a mode staged with no subjects without inserting', async () => {
			const { store, verbs, find } = recordingDatabase();

			await store.writeAuthorization('R', { read: [] });

			expect(verbs()).toEqual(['begin', 'delete', 'commit']);
			expect(find('delete')?.params).toEqual(['R', 'read']);
		});

		it('should issue no statements when no mode is staged', async () => {
			const { store, statements } = recordingDatabase();

			await store.writeAuthorization('R', {});

			expect(statements).toEqual([]);
		});

		it('should roll back and report the store unavailable when the insert fails', async () => {
			const { store, verbs } = recordingDatabase((statement) => {
				if (statement.sql.startsWith('insert')) {
					throw new Error('connection reset');
				}
				return [];
			});

			const failure = store.writeAuthorization('R', { read: ['u1'] });

			await expect(failure).rejects.toBeInstanceOf(BackingStoreError);
			await expect(failure).rejects.toMatchObject({
				code: StoreErrorCodes.UNAVAILABLE,
				operation: 'writeAuthorization',
				message: 'writeAuthorization: connection reset',
			});
			expect(verbs()).toEqual(['begin', 'delete', 'insert', 'rollback']);
		});
	});

	describe('readAuthorizations', () => {
		it('should group rows by mode in the order returned', async () => {
			const { store, find } = recordingDatabase(() => [
				['read', 'a'],
				['write', 'b'],
				['write', 'c'],
			]);

			await expect(store.readAuthorizations('R')).resolves.toEqual({ read: ['a'], write: ['b', 'c'] });
			expect(find('select')?.params).toEqual(['R']);
		});

		it('should skip rows with an unknown mode', async () => {
			const { store } = recordingDatabase(() => [
				['admin', 'x'],
				['read', 'a'],
			]);

			await expect(store.readAuthorizations('R')).resolves.toEqual({ read: ['a'] });
		});

		it('should return no modes for a resource without rows', async () => {
			const { store } = recordingDatabase();

			await expect(store.readAuthorizations('R')).resolves.toEqual({});
		});
	});

	describe('createIdentity', () => {
		it('should insert the identity and its roles in one transaction', async () => {
			const { store, verbs, find } = recordingDatabase();

			const id = await store.createIdentity(identity);

			expect(id).toMatch(/^idn_[0-9a-f]{32}$/);
			expect(verbs()).toEqual(['begin', 'insert', 'delete', 'insert', 'commit']);
			expect(find('insert into "identities"')?.params).toEqual([
				id,
				'123',
				'jdoe',
				'Jane Doe',
				'jdoe@d.edu',
				'jdoe',
			]);
			expect(find('insert into "identity_roles"')?.params).toEqual([id, 'SUBMITTER']);
		});

		it('should map a unique violation to a conflict and roll back', async () => {
			const duplicate = pgError('23505', 'duplicate key value violates unique constraint "idx_identities_local_key"');
			const { store, verbs } = recordingDatabase((statement) => {
				if (statement.sql.startsWith('insert into "identities"')) {
					throw duplicate;
				}
				return [];
			});

			const failure = store.createIdentity(identity);

			await expect(failure).rejects.toMatchObject({
				code: StoreErrorCodes.CONFLICT,
				operation: 'createIdentity',
				cause: duplicate,
			});
			expect(verbs()).toEqual(['begin', 'insert', 'rollback']);
		});
	});

	describe('updateIdentity', () => {
		it('should update the fields and replace the roles', async () => {
			const { store, verbs, find } = recordingDatabase((statement) =>
				statement.sql.startsWith('update') ? [['idn_1']] : [],
			);

			await store.updateIdentity({ id: 'idn_1', ...identity, roles: [Role.SUBMITTER, Role.ADMIN] });

			expect(verbs()).toEqual(['begin', 'update', 'delete', 'insert', 'commit']);
			expect(find('delete')?.params).toEqual(['idn_1']);
			expect(find('insert')?.params).toEqual(['idn_1', 'SUBMITTER', 'idn_1', 'ADMIN']);
		});

		it('should report a missing identity as not found and roll back', async () => {
			const { store, verbs } = recordingDatabase();

			const failure = store.updateIdentity({ id: 'idn_gone', ...identity });

			await expect(failure).rejects.toMatchObject({
				code: StoreErrorCodes.NOT_FOUND,
				operation: 'updateIdentity',
				message: "updateIdentity: identity 'idn_gone' not found",
			});
			expect(verbs()).toEqual(['begin', 'update', 'rollback']);
		});
	});

	describe('lookups', () => {
		it('should find an identity id by local key', async () => {
			const { store, find } = recordingDatabase(() => [['idn_1']]);

			await expect(store.findIdentityByKey('123')).resolves.toBe('idn_1');
			expect(find('select')?.params[0]).toBe('123');
		});

		it('should find nothing for an unknown local key', async () => {
			const { store } = recordingDatabase();

			await expect(store.findIdentityByKey('404')).resolves.toBeUndefined();
		});

		it('should read an identity with its known roles', async () => {
			const { store } = recordingDatabase((statement) =>
				statement.sql.includes('from "identity_roles"')
					? [['ADMIN'], ['OWNER']]
					: [['idn_1', '2024-01-01T00:00:00.000Z', '2024-01-01T00:00:00.000Z', '123', 'jdoe', 'Jane Doe', null, 'jdoe']],
			);

			await expect(store.readIdentity('idn_1')).resolves.toEqual({
				id: 'idn_1',
				localKey: '123',
				username: 'jdoe',
				displayName: 'Jane Doe',
				email: undefined,
				institutionalId: 'jdoe',
				roles: ['ADMIN'],
			});
		});

		it('should read nothing for an unknown id', async () => {
			const { store, statements } = recordingDatabase();

			await expect(store.readIdentity('idn_gone')).resolves.toBeUndefined();
			expect(statements).toHaveLength(1);
		});

		it('should report a driver failure as the store unavailable', async () => {
			const { store } = recordingDatabase(() => {
				throw pgError('57P01', 'terminating connection due to administrator command');
			});

			await expect(store.findIdentityByKey('123')).rejects.toMatchObject({
				code: StoreErrorCodes.UNAVAILABLE,
				operation: 'findIdentityByKey',
			});
		});
	});

	it('should run the close hook', async () => {
		const { store, onClose } = recordingDatabase();

		await store.close();

		expect(onClose).toHaveBeenCalledTimes(1);
	});
});
