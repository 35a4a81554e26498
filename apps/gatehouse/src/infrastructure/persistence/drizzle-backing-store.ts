/**
 * Drizzle Backing Store
 *
 * PostgreSQL implementation of the backing store. Identity creation and
 * multi-mode authorization writes each run in one transaction.
 */

import { and, eq, inArray } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import {
	createTransactionManager,
	isUniqueViolation,
	type Queryable,
	type TransactionManager,
} from '@gatehouse/persistence';
import type { Logger } from '@gatehouse/logging';
import {
	generateIdentityId,
	grantEntries,
	isRole,
	type AccessMode,
	type AuthorizationGrants,
	type Identity,
	type NewIdentity,
	type Role,
} from '../../domain/index.js';
import { BackingStoreError, StoreErrorCodes, type BackingStore } from '../backing-store.js';
import { authorizations, identities, identityRoles, type IdentityRecord } from './schema/index.js';

export interface DrizzleBackingStoreOptions<TQueryResult extends PgQueryResultHKT> {
	logger?: Logger;
	/** Runs the multi-statement writes; defaults to `db.transaction` */
	transactions?: TransactionManager<TQueryResult>;
	/** Called by {@link BackingStore.close}, typically the pool's close */
	onClose?: () => Promise<void>;
}

function toStoreError(operation: string, error: unknown): BackingStoreError {
	if (error instanceof BackingStoreError) {
		return error;
	}
	if (isUniqueViolation(error)) {
		return new BackingStoreError(StoreErrorCodes.CONFLICT, operation, 'unique constraint violated', { cause: error });
	}
	const message = error instanceof Error ? error.message : String(error);
	return new BackingStoreError(StoreErrorCodes.UNAVAILABLE, operation, message, { cause: error });
}

function recordToIdentity(record: IdentityRecord, roles: readonly Role[]): Identity {
	return {
		id: record.id,
		localKey: record.localKey ?? undefined,
		username: record.username ?? undefined,
		displayName: record.displayName ?? undefined,
		email: record.email ?? undefined,
		institutionalId: record.institutionalId ?? undefined,
		roles,
	};
}

function isAccessMode(value: string): value is AccessMode {
	return value === 'read' || value === 'write';
}

async function replaceRoles<TQueryResult extends PgQueryResultHKT>(
	db: Queryable<TQueryResult>,
	identityId: string,
	roles: readonly Role[],
): Promise<void> {
	await db.delete(identityRoles).where(eq(identityRoles.identityId, identityId));
	if (roles.length > 0) {
		await db.insert(identityRoles).values([...new Set(roles)].map((role) => ({ identityId, role })));
	}
}

/**
 * Create a backing store over a Drizzle database.
 */
export function createDrizzleBackingStore<TQueryResult extends PgQueryResultHKT>(
	db: PgDatabase<TQueryResult>,
	options: DrizzleBackingStoreOptions<TQueryResult> = {},
): BackingStore {
	const transactions = options.transactions ?? createTransactionManager(db);
	const log = options.logger?.child({ component: 'DrizzleBackingStore' });

	async function run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			const storeError = toStoreError(operation, error);
			log?.debug({ operation, code: storeError.code, err: error }, 'Store operation failed');
			throw storeError;
		}
	}

	return {
		findIdentityByKey(localKey) {
			return run('findIdentityByKey', async () => {
				const [row] = await db
					.select({ id: identities.id })
					.from(identities)
					.where(eq(identities.localKey, localKey))
					.limit(1);
				return row?.id;
			});
		},

		createIdentity(identity: NewIdentity) {
			return run('createIdentity', () =>
				transactions.inTransaction(async (tx) => {
					const id = generateIdentityId();
					await tx.db.insert(identities).values({
						id,
						localKey: identity.localKey ?? null,
						username: identity.username ?? null,
						displayName: identity.displayName ?? null,
						email: identity.email ?? null,
						institutionalId: identity.institutionalId ?? null,
					});
					await replaceRoles(tx.db, id, identity.roles);
					return id;
				}),
			);
		},

		readIdentity(id) {
			return run('readIdentity', async () => {
				const [record] = await db.select().from(identities).where(eq(identities.id, id)).limit(1);
				if (!record) {
					return undefined;
				}
				const roleRows = await db
					.select({ role: identityRoles.role })
					.from(identityRoles)
					.where(eq(identityRoles.identityId, id));
				return recordToIdentity(
					record,
					roleRows.map((row) => row.role).filter(isRole),
				);
			});
		},

		updateIdentity(identity) {
			return run('updateIdentity', () =>
				transactions.inTransaction(async (tx) => {
					const updated = await tx.db
						.update(identities)
						.set({
							username: identity.username ?? null,
							displayName: identity.displayName ?? null,
							email: identity.email ?? null,
							institutionalId: identity.institutionalId ?? null,
							updatedAt: new Date(),
						})
						.where(eq(identities.id, identity.id))
						.returning({ id: identities.id });
					if (updated.length === 0) {
						throw new BackingStoreError(
							StoreErrorCodes.NOT_FOUND,
							'updateIdentity',
							`identity '${identity.id}' not found`,
						);
					}
					await replaceRoles(tx.db, identity.id, identity.roles);
				}),
			);
		},

		writeAuthorization(resourceId, grants: AuthorizationGrants) {
			const entries = grantEntries(grants);
			return run('writeAuthorization', async () => {
				if (entries.length === 0) {
					return;
				}
				await transactions.inTransaction(async (tx) => {
					await tx.db.delete(authorizations).where(
						and(
							eq(authorizations.resourceId, resourceId),
							inArray(
								authorizations.mode,
								entries.map(([mode]) => mode),
							),
						),
					);
					const rows = entries.flatMap(([mode, subjects]) =>
						[...new Set(subjects)].map((subject) => ({ resourceId, mode, subject })),
					);
					if (rows.length > 0) {
						await tx.db.insert(authorizations).values(rows);
					}
				});
			});
		},

		readAuthorizations(resourceId) {
			return run('readAuthorizations', async () => {
				const rows = await db
					.select({ mode: authorizations.mode, subject: authorizations.subject })
					.from(authorizations)
					.where(eq(authorizations.resourceId, resourceId))
					.orderBy(authorizations.mode, authorizations.createdAt);
				const grants: Partial<Record<AccessMode, string[]>> = {};
				for (const { mode, subject } of rows) {
					if (isAccessMode(mode)) {
						(grants[mode] ??= []).push(subject);
					}
				}
				return grants;
			});
		},

		async close() {
			await options.onClose?.();
		},
	};
}
