/**
 * Persistence
 *
 * Drizzle-backed implementation of the RBAC store.
 */

import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { createTransactionManager } from '@tenantgate/persistence';

import {
	createDirectoryRepository,
	createMembershipRepository,
	createPermissionRepository,
	createRefreshTokenRepository,
	createRoleRepository,
} from './repositories/index.js';
import type { RbacStore } from './rbac-store.js';

export * from './rbac-store.js';
export * from './repositories/index.js';

/**
 * Assemble the full store from its repositories.
 */
export function createDrizzleRbacStore(db: PostgresJsDatabase): RbacStore {
	const transactions = createTransactionManager(db);
	return {
		...createRoleRepository(db),
		...createPermissionRepository(db, transactions),
		...createMembershipRepository(db, transactions),
		...createDirectoryRepository(db),
		...createRefreshTokenRepository(db),
	};
}
