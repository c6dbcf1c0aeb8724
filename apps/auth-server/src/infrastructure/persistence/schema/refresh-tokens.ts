/**
 * Refresh Tokens Database Schema
 */

import { pgTable, varchar, text, boolean, index } from 'drizzle-orm/pg-core';
import { idColumn, timestampColumn } from '@tenantgate/persistence';
import type { TokenType } from '../../../domain/index.js';

export const refreshTokens = pgTable(
	'refresh_tokens',
	{
		id: idColumn(),
		userEmail: varchar('user_email', { length: 255 }).notNull(),
		token: text('token').notNull().unique(),
		tokenType: varchar('token_type', { length: 10 }).notNull().$type<TokenType>(),
		/** 64 hex chars; only the asymmetric strategy sets one */
		nonce: varchar('nonce', { length: 64 }),
		expiresAt: timestampColumn('expires_at').notNull(),
		revoked: boolean('revoked').notNull().default(false),
		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [index('idx_refresh_tokens_user_email').on(table.userEmail)],
);

export type RefreshTokenRow = typeof refreshTokens.$inferSelect;
