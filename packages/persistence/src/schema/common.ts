/**
 * Common Schema Definitions
 *
 * Shared column definitions used across all database tables.
 */

import { serial, integer, timestamp } from 'drizzle-orm/pg-core';

/**
 * Auto-incrementing integer primary key.
 */
export const idColumn = (name = 'id') => serial(name).primaryKey();

/**
 * Integer foreign key column.
 */
export const refColumn = (name: string) => integer(name);

/**
 * Standard timestamp column with timezone.
 */
export const timestampColumn = (name: string) => timestamp(name, { withTimezone: true, mode: 'date' });

/**
 * Creation/modification timestamps that every mutable entity carries.
 */
export const auditColumns = {
	createdAt: timestampColumn('created_at').notNull().defaultNow(),
	updatedAt: timestampColumn('updated_at').notNull().defaultNow(),
};
