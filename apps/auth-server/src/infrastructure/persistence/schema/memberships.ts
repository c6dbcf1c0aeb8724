/**
 * Membership Database Schema
 *
 * Global role assignments plus per-organization and per-team membership.
 * The composite primary keys enforce one role per user per organization/team.
 */

import { pgTable, index, primaryKey } from 'drizzle-orm/pg-core';
import { refColumn, timestampColumn } from '@tenantgate/persistence';
import { users } from './users.js';
import { organizations, teams } from './organizations.js';
import { roles } from './roles.js';

export const userRoles = pgTable(
	'user_roles',
	{
		userId: refColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		roleId: refColumn('role_id')
			.notNull()
			.references(() => roles.id, { onDelete: 'restrict' }),
	},
	(table) => [primaryKey({ columns: [table.userId, table.roleId] })],
);

export const organizationUsers = pgTable(
	'organization_users',
	{
		organizationId: refColumn('organization_id')
			.notNull()
			.references(() => organizations.id, { onDelete: 'cascade' }),
		userId: refColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		roleId: refColumn('role_id')
			.notNull()
			.references(() => roles.id, { onDelete: 'restrict' }),
		joinedAt: timestampColumn('joined_at').notNull().defaultNow(),
	},
	(table) => [
		primaryKey({ columns: [table.organizationId, table.userId] }),
		index('idx_organization_users_user_id').on(table.userId),
		index('idx_organization_users_role_id').on(table.roleId),
	],
);

export const teamMembers = pgTable(
	'team_members',
	{
		teamId: refColumn('team_id')
			.notNull()
			.references(() => teams.id, { onDelete: 'cascade' }),
		userId: refColumn('user_id')
			.notNull()
			.references(() => users.id, { onDelete: 'cascade' }),
		roleId: refColumn('role_id')
			.notNull()
			.references(() => roles.id, { onDelete: 'restrict' }),
		joinedAt: timestampColumn('joined_at').notNull().defaultNow(),
	},
	(table) => [
		primaryKey({ columns: [table.teamId, table.userId] }),
		index('idx_team_members_user_id').on(table.userId),
		index('idx_team_members_role_id').on(table.roleId),
	],
);
