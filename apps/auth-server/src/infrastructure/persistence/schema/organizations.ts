/**
 * Organizations and Teams Database Schema
 */

import { pgTable, varchar, text, index, unique } from 'drizzle-orm/pg-core';
import { idColumn, refColumn, timestampColumn } from '@tenantgate/persistence';

export const organizations = pgTable('organizations', {
	id: idColumn(),
	name: varchar('name', { length: 255 }).notNull(),
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
});

export const teams = pgTable(
	'teams',
	{
		id: idColumn(),
		organizationId: refColumn('organization_id')
			.notNull()
			.references(() => organizations.id, { onDelete: 'cascade' }),
		name: varchar('name', { length: 255 }).notNull(),
		description: text('description'),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_teams_organization_id').on(table.organizationId),
		unique('uq_teams_organization_name').on(table.organizationId, table.name),
	],
);

export type OrganizationRecord = typeof organizations.$inferSelect;
export type TeamRecord = typeof teams.$inferSelect;
export type NewTeamRecord = typeof teams.$inferInsert;
