/**
 * Persisted refresh token.
 *
 * The row outlives signature checks: a refresh token is only honoured while
 * its row exists, is not revoked and has not expired.
 */

export const TOKEN_TYPES = ['jwt', 'paseto'] as const;

export type TokenType = (typeof TOKEN_TYPES)[number];

export interface RefreshTokenRecord {
	readonly id: number;
	readonly userEmail: string;
	readonly token: string;
	readonly tokenType: TokenType;
	readonly nonce: string | null;
	readonly expiresAt: Date;
	readonly revoked: boolean;
	readonly createdAt: Date;
}

export interface NewRefreshToken {
	readonly userEmail: string;
	readonly token: string;
	readonly tokenType: TokenType;
	readonly nonce: string | null;
	readonly expiresAt: Date;
}

/**
 * Whether the stored row still backs a refresh.
 */
export function isRefreshTokenUsable(record: RefreshTokenRecord, now: Date): boolean {
	return !record.revoked && record.expiresAt.getTime() > now.getTime();
}
