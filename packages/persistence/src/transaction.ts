/**
 * Transaction Management
 *
 * Transaction context and utilities for atomic database operations.
 * Uses postgres.js transactions with DrizzleORM.
 */

import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';

/**
 * Transaction context passed to repository operations.
 * Contains the database instance scoped to the current transaction.
 */
export interface TransactionContext {
	/** DrizzleORM database instance scoped to this transaction */
	readonly db: PostgresJsDatabase;
}

/**
 * Transaction manager for executing atomic operations.
 */
export interface TransactionManager {
	/**
	 * Execute a function within a database transaction.
	 * If the function throws, the transaction is rolled back and the error re-thrown.
	 */
	inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T>;

	/**
	 * Get the database instance (for non-transactional queries).
	 */
	readonly db: PostgresJsDatabase;
}

/**
 * Create a transaction manager from a DrizzleORM database instance.
 */
export function createTransactionManager(db: PostgresJsDatabase): TransactionManager {
	return {
		db,
		async inTransaction<T>(fn: (tx: TransactionContext) => Promise<T>): Promise<T> {
			return db.transaction(async (tx) => {
				// PgTransaction shares the query surface of the database it came from
				return fn({ db: tx as unknown as PostgresJsDatabase });
			});
		},
	};
}

/**
 * Resolve the database instance from a transaction context or fall back to default.
 */
export function resolveDb(defaultDb: PostgresJsDatabase, tx?: TransactionContext): PostgresJsDatabase {
	return tx?.db ?? defaultDb;
}
