/**
 * Common Schema Definitions
 *
 * Shared column definitions and types used across database tables.
 */

import { varchar, timestamp } from 'drizzle-orm/pg-core';

/**
 * Prefixed identifier column, e.g. "idn_3f0c9d2a6b8e4f1d9a7c5e3b1d0f2a4c".
 */
export const idColumn = (name: string) => varchar(name, { length: 40 });

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Base entity fields.
 */
export const baseEntityColumns = {
	id: idColumn('id').primaryKey(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};
