/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Uses postgres.js transactions with DrizzleORM.
 */

import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';

/**
 * Drizzle handle usable for queries: the pooled database or an open transaction.
 * Parameterized by the driver's result kind; postgres.js unless stated.
 */
export type Queryable<TQueryResult extends PgQueryResultHKT = PostgresJsQueryResultHKT> = Pick<
	PgDatabase<TQueryResult>,
	'select' | 'insert' | 'update' | 'delete'
>;

/**
 * Transaction context passed to store operations.
 */
export interface TransactionContext<TQueryResult extends PgQueryResultHKT = PostgresJsQueryResultHKT> {
	/** Handle scoped to this transaction */
	readonly db: Queryable<TQueryResult>;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager<TQueryResult extends PgQueryResultHKT = PostgresJsQueryResultHKT> {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back.
	 * If the function returns, the transaction is committed.
	 */
	inTransaction<T>(fn: (tx: TransactionContext<TQueryResult>) => Promise<T>): Promise<T>;

	/**
	 * The database instance (for non-transactional queries).
	 */
	readonly db: Queryable<TQueryResult>;
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager<TQueryResult extends PgQueryResultHKT>(
	db: PgDatabase<TQueryResult>,
): TransactionManager<TQueryResult> {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext<TQueryResult>) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => fn({ db: tx }));
		},
	};
}
