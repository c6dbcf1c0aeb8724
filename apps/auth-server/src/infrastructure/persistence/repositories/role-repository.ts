/**
 * Role Repository
 *
 * Data access for roles and global role assignments.
 */

import { asc, eq, type SQL } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { runStoreOperation } from '@tenantgate/persistence';

import { roles, userRoles, organizationUsers, teamMembers, type RoleRecord } from '../schema/index.js';
import type { NewRole, Role, RolePatch, Scope } from '../../../domain/index.js';
import type { RoleStore } from '../rbac-store.js';

/**
 * Create a Role repository.
 */
export function createRoleRepository(db: PostgresJsDatabase): RoleStore {
	async function findOne(where: SQL): Promise<Role | null> {
		const [record] = await db.select().from(roles).where(where).limit(1);
		return record ? recordToRole(record) : null;
	}

	return {
		createRole(role: NewRole, signal?: AbortSignal): Promise<Role> {
			return runStoreOperation('roles.create', signal, async () => {
				const [record] = await db
					.insert(roles)
					.values({
						name: role.name,
						slug: role.slug,
						description: role.description,
						scope: role.scope,
						inheritsRoleId: role.inheritsRoleId,
					})
					.returning();
				if (!record) throw new Error('insert returned no row');
				return recordToRole(record);
			});
		},

		getRoleById(id: number, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('roles.getById', signal, () => findOne(eq(roles.id, id)));
		},

		getRoleByName(name: string, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('roles.getByName', signal, () => findOne(eq(roles.name, name)));
		},

		getRoleBySlug(slug: string, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('roles.getBySlug', signal, () => findOne(eq(roles.slug, slug)));
		},

		listRoles(scope?: Scope, signal?: AbortSignal): Promise<Role[]> {
			return runStoreOperation('roles.list', signal, async () => {
				const records = await db
					.select()
					.from(roles)
					.where(scope ? eq(roles.scope, scope) : undefined)
					.orderBy(asc(roles.id));
				return records.map(recordToRole);
			});
		},

		updateRole(id: number, patch: RolePatch, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('roles.update', signal, async () => {
				const [record] = await db
					.update(roles)
					.set({ ...patch, updatedAt: new Date() })
					.where(eq(roles.id, id))
					.returning();
				return record ? recordToRole(record) : null;
			});
		},

		deleteRole(id: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('roles.delete', signal, async () => {
				const deleted = await db.delete(roles).where(eq(roles.id, id)).returning({ id: roles.id });
				return deleted.length > 0;
			});
		},

		isRoleInUse(id: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('roles.isInUse', signal, async () => {
				const checks = await Promise.all([
					db.select({ roleId: userRoles.roleId }).from(userRoles).where(eq(userRoles.roleId, id)).limit(1),
					db
						.select({ roleId: organizationUsers.roleId })
						.from(organizationUsers)
						.where(eq(organizationUsers.roleId, id))
						.limit(1),
					db.select({ roleId: teamMembers.roleId }).from(teamMembers).where(eq(teamMembers.roleId, id)).limit(1),
					db.select({ id: roles.id }).from(roles).where(eq(roles.inheritsRoleId, id)).limit(1),
				]);
				return checks.some((rows) => rows.length > 0);
			});
		},

		listGlobalRolesOfUser(userId: number, signal?: AbortSignal): Promise<Role[]> {
			return runStoreOperation('roles.listGlobalOfUser', signal, async () => {
				const records = await db
					.select({ role: roles })
					.from(userRoles)
					.innerJoin(roles, eq(roles.id, userRoles.roleId))
					.where(eq(userRoles.userId, userId))
					.orderBy(asc(roles.id));
				return records.map((record) => recordToRole(record.role));
			});
		},

		assignGlobalRole(userId: number, roleId: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('roles.assignGlobal', signal, async () => {
				const inserted = await db
					.insert(userRoles)
					.values({ userId, roleId })
					.onConflictDoNothing()
					.returning({ roleId: userRoles.roleId });
				return inserted.length > 0;
			});
		},
	};
}

/**
 * Convert a database record to a Role.
 */
export function recordToRole(record: RoleRecord): Role {
	return {
		id: record.id,
		name: record.name,
		slug: record.slug,
		description: record.description,
		scope: record.scope,
		inheritsRoleId: record.inheritsRoleId,
		createdAt: record.createdAt,
		updatedAt: record.updatedAt,
	};
}
