/**
 * Permission Repository
 *
 * Data access for permissions and role/permission grants.
 */

import { and, asc, eq, type SQL } from 'drizzle-orm';
import { alias } from 'drizzle-orm/pg-core';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { runStoreOperation, type TransactionManager } from '@tenantgate/persistence';

import { permissions, rolePermissions, roles, type PermissionRecord } from '../schema/index.js';
import type {
	NewPermission,
	Permission,
	PermissionDeleteOutcome,
	PermissionPatch,
	RolePermissionGrant,
} from '../../../domain/index.js';
import type { PermissionStore } from '../rbac-store.js';

const parentRoles = alias(roles, 'parent_roles');

/**
 * Create a Permission repository.
 */
export function createPermissionRepository(db: PostgresJsDatabase, transactions: TransactionManager): PermissionStore {
	async function findOne(where: SQL): Promise<Permission | null> {
		const [record] = await db.select().from(permissions).where(where).limit(1);
		return record ? recordToPermission(record) : null;
	}

	async function inUse(executor: PostgresJsDatabase, id: number): Promise<boolean> {
		const rows = await executor
			.select({ roleId: rolePermissions.roleId })
			.from(rolePermissions)
			.where(eq(rolePermissions.permissionId, id))
			.limit(1);
		return rows.length > 0;
	}

	return {
		createPermission(permission: NewPermission, signal?: AbortSignal): Promise<Permission> {
			return runStoreOperation('permissions.create', signal, async () => {
				const [record] = await db
					.insert(permissions)
					.values({
						name: permission.name,
						slug: permission.slug,
						description: permission.description,
						scope: permission.scope,
					})
					.returning();
				if (!record) throw new Error('insert returned no row');
				return recordToPermission(record);
			});
		},

		getPermissionById(id: number, signal?: AbortSignal): Promise<Permission | null> {
			return runStoreOperation('permissions.getById', signal, () => findOne(eq(permissions.id, id)));
		},

		getPermissionByName(name: string, signal?: AbortSignal): Promise<Permission | null> {
			return runStoreOperation('permissions.getByName', signal, () => findOne(eq(permissions.name, name)));
		},

		getPermissionBySlug(slug: string, signal?: AbortSignal): Promise<Permission | null> {
			return runStoreOperation('permissions.getBySlug', signal, () => findOne(eq(permissions.slug, slug)));
		},

		listPermissions(signal?: AbortSignal): Promise<Permission[]> {
			return runStoreOperation('permissions.list', signal, async () => {
				const records = await db.select().from(permissions).orderBy(asc(permissions.id));
				return records.map(recordToPermission);
			});
		},

		updatePermission(id: number, patch: PermissionPatch, signal?: AbortSignal): Promise<Permission | null> {
			return runStoreOperation('permissions.update', signal, async () => {
				const [record] = await db
					.update(permissions)
					.set({ ...patch, updatedAt: new Date() })
					.where(eq(permissions.id, id))
					.returning();
				return record ? recordToPermission(record) : null;
			});
		},

		deletePermission(id: number, signal?: AbortSignal): Promise<PermissionDeleteOutcome> {
			return runStoreOperation('permissions.delete', signal, () =>
				transactions.inTransaction(async (tx): Promise<PermissionDeleteOutcome> => {
					const [existing] = await tx.db
						.select({ id: permissions.id })
						.from(permissions)
						.where(eq(permissions.id, id))
						.limit(1)
						.for('update');
					if (!existing) return 'not_found';
					if (await inUse(tx.db, id)) return 'in_use';

					await tx.db.delete(permissions).where(eq(permissions.id, id));
					return 'deleted';
				}),
			);
		},

		isPermissionInUse(id: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('permissions.isInUse', signal, () => inUse(db, id));
		},

		assignPermissionToRole(roleId: number, permissionId: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('rolePermissions.assign', signal, async () => {
				const inserted = await db
					.insert(rolePermissions)
					.values({ roleId, permissionId })
					.onConflictDoNothing()
					.returning({ roleId: rolePermissions.roleId });
				return inserted.length > 0;
			});
		},

		removePermissionFromRole(roleId: number, permissionId: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('rolePermissions.remove', signal, async () => {
				const deleted = await db
					.delete(rolePermissions)
					.where(and(eq(rolePermissions.roleId, roleId), eq(rolePermissions.permissionId, permissionId)))
					.returning({ roleId: rolePermissions.roleId });
				return deleted.length > 0;
			});
		},

		listRolePermissions(roleId: number, signal?: AbortSignal): Promise<Permission[]> {
			return runStoreOperation('rolePermissions.listOfRole', signal, async () => {
				const records = await db
					.select({ permission: permissions })
					.from(rolePermissions)
					.innerJoin(permissions, eq(permissions.id, rolePermissions.permissionId))
					.where(eq(rolePermissions.roleId, roleId))
					.orderBy(asc(permissions.id));
				return records.map((record) => recordToPermission(record.permission));
			});
		},

		listRolePermissionGrants(signal?: AbortSignal): Promise<RolePermissionGrant[]> {
			return runStoreOperation('rolePermissions.listGrants', signal, async () => {
				const rows = await db
					.select({
						roleName: roles.name,
						roleScope: roles.scope,
						inheritsRoleName: parentRoles.name,
						permissionName: permissions.name,
					})
					.from(roles)
					.leftJoin(parentRoles, eq(parentRoles.id, roles.inheritsRoleId))
					.leftJoin(rolePermissions, eq(rolePermissions.roleId, roles.id))
					.leftJoin(permissions, eq(permissions.id, rolePermissions.permissionId))
					.orderBy(asc(roles.id), asc(permissions.id));
				return rows;
			});
		},
	};
}

/**
 * Convert a database record to a Permission.
 */
export function recordToPermission(record: PermissionRecord): Permission {
	return {
		id: record.id,
		name: record.name,
		slug: record.slug,
		description: record.description,
		scope: record.scope,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
