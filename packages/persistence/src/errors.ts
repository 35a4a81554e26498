/**
 * PostgreSQL error inspection.
 *
 * postgres.js raises `PostgresError` with the SQLSTATE in `code`. These helpers
 * read it without depending on the driver's class identity.
 */

export const PgErrorCode = {
	UNIQUE_VIOLATION: '23505',
	FOREIGN_KEY_VIOLATION: '23503',
	SERIALIZATION_FAILURE: '40001',
	DEADLOCK_DETECTED: '40P01',
} as const;

export type PgErrorCode = (typeof PgErrorCode)[keyof typeof PgErrorCode];

/**
 * SQLSTATE of a driver error, if it carries one. Drizzle may wrap the driver
 * error, so `cause` is inspected too.
 */
export function pgErrorCode(error: unknown): string | undefined {
	if (typeof error !== 'object' || error === null) {
		return undefined;
	}
	if ('code' in error && typeof error.code === 'string' && /^[0-9A-Z]{5}$/.test(error.code)) {
		return error.code;
	}
	if ('cause' in error) {
		return pgErrorCode(error.cause);
	}
	return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
	return pgErrorCode(error) === PgErrorCode.UNIQUE_VIOLATION;
}
