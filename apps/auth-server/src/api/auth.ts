/**
 * Auth API
 *
 * Login, refresh-token exchange and refresh-token revocation. These routes
 * sit under the public `/auth` prefix and carry no principal.
 */

import type { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import { badRequest, noContent, safeValidate, sendResult } from '@tenantgate/http';
import { Result, type UseCase } from '@tenantgate/application';

import type { LoginCommand } from '../application/index.js';
import type { TokenPair, TokenService } from '../auth/index.js';

const LoginSchema = Type.Object({
	email: Type.String({ minLength: 3, maxLength: 320 }),
	password: Type.String({ minLength: 1, maxLength: 1024 }),
});

const RefreshTokenSchema = Type.Object({
	refreshToken: Type.String({ minLength: 1 }),
});

export interface AuthRoutesDeps {
	readonly tokenService: Pick<TokenService, 'refreshAccessToken' | 'revokeRefreshToken'>;
	readonly loginUseCase: UseCase<LoginCommand, TokenPair>;
}

export async function registerAuthRoutes(fastify: FastifyInstance, deps: AuthRoutesDeps): Promise<void> {
	const { tokenService, loginUseCase } = deps;

	// POST /auth/login - Exchange email and password for a token pair
	fastify.post('/auth/login', { schema: { tags: ['Auth'], summary: 'Log in' } }, async (request, reply) => {
		const bodyResult = safeValidate(request.body, LoginSchema);
		if (!bodyResult.success) {
			return badRequest(reply, bodyResult.error);
		}

		const result = await loginUseCase.execute(bodyResult.data, request.executionContext);
		return sendResult(reply, result);
	});

	// POST /auth/refresh - Exchange a refresh token for a new access token
	fastify.post(
		'/auth/refresh',
		{ schema: { tags: ['Auth'], summary: 'Refresh an access token' } },
		async (request, reply) => {
			const bodyResult = safeValidate(request.body, RefreshTokenSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await tokenService.refreshAccessToken(
				bodyResult.data.refreshToken,
				request.executionContext.signal,
			);
			return sendResult(reply, result);
		},
	);

	// POST /auth/revoke - Revoke a refresh token
	fastify.post(
		'/auth/revoke',
		{ schema: { tags: ['Auth'], summary: 'Revoke a refresh token' } },
		async (request, reply) => {
			const bodyResult = safeValidate(request.body, RefreshTokenSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await tokenService.revokeRefreshToken(
				bodyResult.data.refreshToken,
				request.executionContext.signal,
			);
			if (Result.isSuccess(result)) {
				return noContent(reply);
			}
			return sendResult(reply, result);
		},
	);
}
