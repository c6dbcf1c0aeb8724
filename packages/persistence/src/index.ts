/**
 * @tenantgate/persistence
 *
 * Database persistence layer using DrizzleORM over postgres.js:
 * - Database connection and configuration
 * - Transaction management
 * - Driver error translation
 * - Shared column helpers
 *
 * @example
 * ```typescript
 * import { createDatabase, createTransactionManager } from '@tenantgate/persistence';
 *
 * const database = createDatabase({ url: env.DATABASE_URL });
 * const transactionManager = createTransactionManager(database.db);
 *
 * await transactionManager.inTransaction(async (tx) => {
 *     await roleRepository.insert(role, tx);
 *     await rolePermissionRepository.insert(grant, tx);
 * });
 * ```
 */

// Database connection
export { createDatabase, type Database, type DatabaseConfig } from './connection.js';

// Transaction management
export {
	createTransactionManager,
	resolveDb,
	type TransactionContext,
	type TransactionManager,
} from './transaction.js';

// Errors
export {
	DatabaseError,
	withDatabaseError,
	runStoreOperation,
	sqlStateOf,
	UNIQUE_VIOLATION,
	FOREIGN_KEY_VIOLATION,
} from './errors.js';

// Schema helpers
export { idColumn, refColumn, timestampColumn, auditColumns } from './schema/common.js';
