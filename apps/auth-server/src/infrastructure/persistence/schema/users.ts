/**
 * Users Database Schema
 */

import { pgTable, varchar, boolean, index } from 'drizzle-orm/pg-core';
import { idColumn, timestampColumn } from '@tenantgate/persistence';

export const users = pgTable(
	'users',
	{
		id: idColumn(),
		email: varchar('email', { length: 255 }).notNull().unique(),
		firstName: varchar('first_name', { length: 100 }),
		lastName: varchar('last_name', { length: 100 }),
		phoneNumber: varchar('phone_number', { length: 50 }),
		verified: boolean('verified').notNull().default(false),
		/** argon2id hash; null for users who cannot log in with a password */
		passwordHash: varchar('password_hash', { length: 255 }),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [index('idx_users_email').on(table.email)],
);

export type UserRecord = typeof users.$inferSelect;
export type NewUserRecord = typeof users.$inferInsert;
