/**
 * Roles Database Schema
 *
 * Roles, permissions and the grant table between them.
 */

import { pgTable, varchar, text, index, primaryKey, type AnyPgColumn } from 'drizzle-orm/pg-core';
import { auditColumns, idColumn, refColumn } from '@tenantgate/persistence';
import type { Scope } from '../../../domain/index.js';

export const roles = pgTable(
	'roles',
	{
		id: idColumn(),
		name: varchar('name', { length: 100 }).notNull().unique(),
		slug: varchar('slug', { length: 100 }).notNull().unique(),
		description: text('description'),
		scope: varchar('scope', { length: 20 }).notNull().$type<Scope>(),
		/** Parent role whose grants this role inherits */
		inheritsRoleId: refColumn('inherits_role_id').references((): AnyPgColumn => roles.id, {
			onDelete: 'set null',
		}),
		...auditColumns,
	},
	(table) => [index('idx_roles_scope').on(table.scope)],
);

export const permissions = pgTable(
	'permissions',
	{
		id: idColumn(),
		/** Encodes route and methods, e.g. "teams:create:POST" */
		name: varchar('name', { length: 150 }).notNull().unique(),
		slug: varchar('slug', { length: 150 }).notNull().unique(),
		description: text('description'),
		scope: varchar('scope', { length: 20 }).notNull().$type<Scope>(),
		...auditColumns,
	},
	(table) => [index('idx_permissions_scope').on(table.scope)],
);

export const rolePermissions = pgTable(
	'role_permissions',
	{
		roleId: refColumn('role_id')
			.notNull()
			.references(() => roles.id, { onDelete: 'cascade' }),
		permissionId: refColumn('permission_id')
			.notNull()
			.references(() => permissions.id, { onDelete: 'restrict' }),
	},
	(table) => [
		primaryKey({ columns: [table.roleId, table.permissionId] }),
		index('idx_role_permissions_permission_id').on(table.permissionId),
	],
);

export type RoleRecord = typeof roles.$inferSelect;
export type NewRoleRecord = typeof roles.$inferInsert;
export type PermissionRecord = typeof permissions.$inferSelect;
export type NewPermissionRecord = typeof permissions.$inferInsert;
