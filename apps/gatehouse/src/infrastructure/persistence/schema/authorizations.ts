import { pgTable, varchar, index, primaryKey } from 'drizzle-orm/pg-core';
import { timestampColumn } from '@gatehouse/persistence';

/**
 * One row per (resource, mode, subject token).
 */
export const authorizations = pgTable(
	'authorizations',
	{
		resourceId: varchar('resource_id', { length: 1024 }).notNull(),
		mode: varchar('mode', { length: 10 }).notNull(),
		subject: varchar('subject', { length: 1024 }).notNull(),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [
		primaryKey({ columns: [table.resourceId, table.mode, table.subject] }),
		index('idx_authorizations_resource').on(table.resourceId),
	],
);

export type AuthorizationRecord = typeof authorizations.$inferSelect;
