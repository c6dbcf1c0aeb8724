/**
 * Refresh Token Repository
 */

import { eq } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { runStoreOperation } from '@tenantgate/persistence';

import { refreshTokens, type RefreshTokenRow } from '../schema/index.js';
import type { NewRefreshToken, RefreshTokenRecord } from '../../../domain/index.js';
import type { RefreshTokenStore } from '../rbac-store.js';

/**
 * Create a Refresh Token repository.
 */
export function createRefreshTokenRepository(db: PostgresJsDatabase): RefreshTokenStore {
	return {
		saveRefreshToken(token: NewRefreshToken, signal?: AbortSignal): Promise<RefreshTokenRecord> {
			return runStoreOperation('refreshTokens.save', signal, async () => {
				const [row] = await db
					.insert(refreshTokens)
					.values({
						userEmail: token.userEmail,
						token: token.token,
						tokenType: token.tokenType,
						nonce: token.nonce,
						expiresAt: token.expiresAt,
					})
					.returning();
				if (!row) throw new Error('insert returned no row');
				return rowToRefreshToken(row);
			});
		},

		findRefreshToken(token: string, signal?: AbortSignal): Promise<RefreshTokenRecord | null> {
			return runStoreOperation('refreshTokens.find', signal, async () => {
				const [row] = await db.select().from(refreshTokens).where(eq(refreshTokens.token, token)).limit(1);
				return row ? rowToRefreshToken(row) : null;
			});
		},

		revokeRefreshToken(token: string, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('refreshTokens.revoke', signal, async () => {
				const updated = await db
					.update(refreshTokens)
					.set({ revoked: true })
					.where(eq(refreshTokens.token, token))
					.returning({ id: refreshTokens.id });
				return updated.length > 0;
			});
		},
	};
}

function rowToRefreshToken(row: RefreshTokenRow): RefreshTokenRecord {
	return {
		id: row.id,
		userEmail: row.userEmail,
		token: row.token,
		tokenType: row.tokenType,
		nonce: row.nonce,
		expiresAt: row.expiresAt,
		revoked: row.revoked,
		createdAt: row.createdAt,
	};
}
