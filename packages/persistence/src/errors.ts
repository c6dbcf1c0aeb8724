/**
 * Database error translation.
 *
 * Driver errors never cross the persistence boundary as-is: stores wrap them
 * in {@link DatabaseError}, which carries the SQLSTATE and the failed
 * operation name but never the query text.
 */

import { abortable, DeadlineExceededError } from '@tenantgate/domain-core';

/** SQLSTATE for unique_violation. */
export const UNIQUE_VIOLATION = '23505';

/** SQLSTATE for foreign_key_violation. */
export const FOREIGN_KEY_VIOLATION = '23503';

export class DatabaseError extends Error {
	readonly operation: string;
	readonly sqlState: string | null;

	constructor(operation: string, cause: unknown) {
		super(`Database operation failed: ${operation}`, { cause });
		this.name = 'DatabaseError';
		this.operation = operation;
		this.sqlState = sqlStateOf(cause);
	}

	get isUniqueViolation(): boolean {
		return this.sqlState === UNIQUE_VIOLATION;
	}
}

/**
 * Find the SQLSTATE on a driver error, following `cause` links.
 */
export function sqlStateOf(error: unknown): string | null {
	let current: unknown = error;
	for (let depth = 0; depth < 5 && typeof current === 'object' && current !== null; depth++) {
		if ('code' in current && typeof current.code === 'string' && /^[0-9A-Z]{5}$/.test(current.code)) {
			return current.code;
		}
		current = 'cause' in current ? current.cause : undefined;
	}
	return null;
}

/**
 * Run a store operation, converting any thrown driver error to {@link DatabaseError}.
 */
export async function withDatabaseError<T>(operation: string, fn: () => Promise<T>): Promise<T> {
	try {
		return await fn();
	} catch (error) {
		if (error instanceof DatabaseError) throw error;
		throw new DatabaseError(operation, error);
	}
}

/**
 * Run a store operation on behalf of a caller: refuse to start once `signal`
 * has aborted, stop waiting when it aborts mid-flight, and translate driver
 * errors to {@link DatabaseError}.
 */
export function runStoreOperation<T>(
	operation: string,
	signal: AbortSignal | undefined,
	fn: () => Promise<T>,
): Promise<T> {
	if (signal?.aborted) {
		return Promise.reject(new DeadlineExceededError());
	}
	return abortable(withDatabaseError(operation, fn), signal);
}
