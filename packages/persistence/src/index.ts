/**
 * @gatehouse/persistence
 *
 * PostgreSQL access through DrizzleORM and postgres.js:
 * - Connection pool factory
 * - Transaction manager
 * - Shared column helpers
 * - Driver error inspection
 */

export { createDatabase, type Database, type DatabaseConfig } from './connection.js';
export {
	createTransactionManager,
	type Queryable,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';
export { idColumn, timestampColumn, baseEntityColumns } from './schema/common.js';
export { PgErrorCode, pgErrorCode, isUniqueViolation } from './errors.js';
