/**
 * Token Service
 *
 * Issues and verifies access and refresh tokens through the configured
 * {@link TokenSigner}. Refresh tokens are persisted and are honoured only
 * while their row is present, unrevoked and unexpired. They are never
 * accepted where an access token is expected.
 *
 * Every refresh-token failure is reported as the same `INVALID_TOKEN` error
 * so callers cannot tell which check failed.
 */

import { randomBytes } from 'node:crypto';
import { Result, UseCaseError } from '@tenantgate/domain-core';
import type { Logger } from '@tenantgate/logging';
import { isRefreshTokenUsable } from '../domain/index.js';
import type { RefreshTokenStore } from '../infrastructure/persistence/index.js';
import {
	buildClaims,
	expiresAtOf,
	parseClaims,
	type ClaimsInput,
	type TokenClaims,
	type TokenSigner,
	type TokenUse,
} from './token/index.js';
import type { ActiveContext, ContextPayloadAssembler } from './context-payload.js';

export interface TokenPair {
	readonly accessToken: string;
	readonly refreshToken: string;
	readonly tokenType: 'bearer';
	/** Access token lifetime in seconds */
	readonly expiresIn: number;
}

export interface IssuedToken {
	readonly token: string;
	readonly claims: TokenClaims;
}

export interface TokenService {
	readonly accessTokenTtlMs: number;
	readonly refreshTokenTtlMs: number;
	createAccessToken(claims: ClaimsInput, ttlMs?: number): Promise<string>;
	createContextEnrichedToken(
		userEmail: string,
		ttlMs?: number,
		context?: ActiveContext,
		signal?: AbortSignal,
	): Promise<string>;
	/** Same as {@link createContextEnrichedToken}, also returning the signed claims. */
	issueContextEnrichedToken(
		userEmail: string,
		ttlMs?: number,
		context?: ActiveContext,
		signal?: AbortSignal,
	): Promise<IssuedToken>;
	createRefreshToken(claims: ClaimsInput, ttlMs?: number, signal?: AbortSignal): Promise<string>;
	/** Claims of a valid, unexpired access token; null for anything else, refresh tokens included. */
	verifyToken(token: string): Promise<TokenClaims | null>;
	verifyRefreshToken(token: string, signal?: AbortSignal): Promise<Result<TokenClaims>>;
	refreshAccessToken(refreshToken: string, signal?: AbortSignal): Promise<Result<TokenPair>>;
	revokeRefreshToken(token: string, signal?: AbortSignal): Promise<Result<void>>;
}

export interface TokenServiceDeps {
	readonly signer: TokenSigner;
	readonly refreshTokens: RefreshTokenStore;
	readonly contextPayload: ContextPayloadAssembler;
	readonly accessTokenTtlMs: number;
	readonly refreshTokenTtlMs: number;
	readonly logger: Logger;
	readonly clock?: (() => Date) | undefined;
	/** 64 hex characters; overridable for tests */
	readonly nonce?: (() => string) | undefined;
}

export const INVALID_TOKEN_MESSAGE = 'Could not validate credentials';

function invalidToken() {
	return Result.failure(UseCaseError.unauthorized('INVALID_TOKEN', INVALID_TOKEN_MESSAGE));
}

export function createTokenService(deps: TokenServiceDeps): TokenService {
	const { signer, refreshTokens, contextPayload, accessTokenTtlMs, refreshTokenTtlMs, logger } = deps;
	const clock = deps.clock ?? (() => new Date());
	const nonce = deps.nonce ?? (() => randomBytes(32).toString('hex'));

	async function issue(claims: ClaimsInput, ttlMs: number, use: TokenUse = 'access'): Promise<IssuedToken> {
		const built = buildClaims(claims, ttlMs, clock(), use);
		return { token: await signer.sign(built), claims: built };
	}

	async function verifyAs(token: string, use: TokenUse): Promise<TokenClaims | null> {
		const payload = await signer.verify(token);
		const claims = payload ? parseClaims(payload, clock()) : null;
		return claims?.token_use === use ? claims : null;
	}

	async function verifyToken(token: string): Promise<TokenClaims | null> {
		return verifyAs(token, 'access');
	}

	async function verifyRefreshToken(token: string, signal?: AbortSignal): Promise<Result<TokenClaims>> {
		const claims = await verifyAs(token, 'refresh');
		if (!claims) return invalidToken();

		const record = await refreshTokens.findRefreshToken(token, signal);
		if (!record || !isRefreshTokenUsable(record, clock())) {
			logger.debug({ found: record !== null }, 'Refresh token rejected');
			return invalidToken();
		}
		return Result.success(claims);
	}

	async function issueContextEnrichedToken(
		userEmail: string,
		ttlMs = accessTokenTtlMs,
		context: ActiveContext = {},
		signal?: AbortSignal,
	): Promise<IssuedToken> {
		const payload = await contextPayload.assemble(userEmail, context, signal);
		return issue(payload, ttlMs);
	}

	return {
		accessTokenTtlMs,
		refreshTokenTtlMs,

		async createAccessToken(claims, ttlMs = accessTokenTtlMs) {
			return (await issue(claims, ttlMs)).token;
		},

		issueContextEnrichedToken,

		async createContextEnrichedToken(userEmail, ttlMs, context, signal) {
			return (await issueContextEnrichedToken(userEmail, ttlMs, context, signal)).token;
		},

		async createRefreshToken(claims, ttlMs = refreshTokenTtlMs, signal) {
			const tokenNonce = signer.requiresNonce ? nonce() : null;
			const { token, claims: signed } = await issue(
				tokenNonce === null ? claims : { ...claims, nonce: tokenNonce },
				ttlMs,
				'refresh',
			);

			await refreshTokens.saveRefreshToken(
				{
					userEmail: claims.sub,
					token,
					tokenType: signer.kind,
					nonce: tokenNonce,
					expiresAt: expiresAtOf(signed),
				},
				signal,
			);
			return token;
		},

		verifyToken,

		verifyRefreshToken,

		async refreshAccessToken(refreshToken, signal) {
			const verified = await verifyRefreshToken(refreshToken, signal);
			if (Result.isFailure(verified)) return verified;

			const { token } = await issue({ sub: verified.value.sub }, accessTokenTtlMs);
			return Result.success({
				accessToken: token,
				refreshToken,
				tokenType: 'bearer' as const,
				expiresIn: Math.floor(accessTokenTtlMs / 1000),
			});
		},

		async revokeRefreshToken(token, signal) {
			const revoked = await refreshTokens.revokeRefreshToken(token, signal);
			if (!revoked) {
				return Result.failure(UseCaseError.notFound('TOKEN_NOT_FOUND', 'Refresh token not found'));
			}
			return Result.success(undefined);
		},
	};
}
