import { pgTable, varchar, uniqueIndex, index, primaryKey } from 'drizzle-orm/pg-core';
import { baseEntityColumns, idColumn } from '@gatehouse/persistence';

/**
 * Identities table.
 */
export const identities = pgTable(
	'identities',
	{
		...baseEntityColumns,
		localKey: varchar('local_key', { length: 255 }),
		username: varchar('username', { length: 255 }),
		displayName: varchar('display_name', { length: 255 }),
		email: varchar('email', { length: 255 }),
		institutionalId: varchar('institutional_id', { length: 255 }),
	},
	(table) => [
		uniqueIndex('idx_identities_local_key').on(table.localKey),
		index('idx_identities_username').on(table.username),
	],
);

/**
 * Roles held by an identity.
 */
export const identityRoles = pgTable(
	'identity_roles',
	{
		identityId: idColumn('identity_id')
			.notNull()
			.references(() => identities.id, { onDelete: 'cascade' }),
		role: varchar('role', { length: 50 }).notNull(),
	},
	(table) => [primaryKey({ columns: [table.identityId, table.role] })],
);

export type IdentityRecord = typeof identities.$inferSelect;
export type NewIdentityRecord = typeof identities.$inferInsert;
