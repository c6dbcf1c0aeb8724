/**
 * Token claims
 *
 * Claims are assembled once, here, whichever signer is active. `exp` is an
 * ISO-8601 string and is checked against the wall clock on every verify.
 * `token_use` tells access tokens from refresh tokens; each verifier accepts
 * only its own kind.
 */

export const TOKEN_USES = ['access', 'refresh'] as const;

export type TokenUse = (typeof TOKEN_USES)[number];

export interface ClaimsInput {
	readonly sub: string;
	readonly [claim: string]: unknown;
}

export interface TokenClaims extends ClaimsInput {
	readonly token_use: TokenUse;
	readonly exp: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isTokenUse(value: unknown): value is TokenUse {
	return TOKEN_USES.some((use) => use === value);
}

/**
 * Copy `input` and stamp the token use and expiry, overwriting any given ones.
 */
export function buildClaims(
	input: ClaimsInput,
	ttlMs: number,
	now: Date = new Date(),
	use: TokenUse = 'access',
): TokenClaims {
	return { ...input, token_use: use, exp: new Date(now.getTime() + ttlMs).toISOString() };
}

/**
 * Validate a decoded payload: string `sub`, a known `token_use`, and an `exp`
 * that parses and lies after `now`. Returns null otherwise.
 */
export function parseClaims(payload: unknown, now: Date = new Date()): TokenClaims | null {
	if (!isRecord(payload)) return null;
	const { sub, token_use: use, exp } = payload;
	if (typeof sub !== 'string' || sub === '' || typeof exp !== 'string' || !isTokenUse(use)) return null;

	const expiresAt = Date.parse(exp);
	if (Number.isNaN(expiresAt) || expiresAt <= now.getTime()) return null;

	return { ...payload, sub, token_use: use, exp };
}

export function expiresAtOf(claims: TokenClaims): Date {
	return new Date(claims.exp);
}
