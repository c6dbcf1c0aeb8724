/**
 * Login Use Case
 *
 * Checks the password against the stored argon2 hash and issues a
 * context-enriched access token with no active organization or team, plus a
 * persisted refresh token. Unknown email, missing hash and wrong password all
 * fail the same way.
 */

import type { UseCase } from '@tenantgate/application';
import { validateRequired, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';
import type { Logger } from '@tenantgate/logging';

import type { DirectoryStore } from '../../../infrastructure/persistence/index.js';
import type { PasswordHasher, TokenPair, TokenService } from '../../../auth/index.js';

import type { LoginCommand } from './command.js';

export interface LoginUseCaseDeps {
	readonly store: Pick<DirectoryStore, 'getUserByEmail'>;
	readonly tokens: Pick<TokenService, 'createContextEnrichedToken' | 'createRefreshToken' | 'accessTokenTtlMs'>;
	readonly passwords: Pick<PasswordHasher, 'verify'>;
	readonly logger: Logger;
}

const INVALID_CREDENTIALS = Result.failure(
	UseCaseError.unauthorized('INVALID_CREDENTIALS', 'Incorrect email or password'),
);

export function createLoginUseCase(deps: LoginUseCaseDeps): UseCase<LoginCommand, TokenPair> {
	const { store, tokens, passwords, logger } = deps;

	return {
		async execute(command: LoginCommand, context: ExecutionContext): Promise<Result<TokenPair>> {
			const { signal } = context;

			const emailResult = validateRequired(command.email, 'email', 'MISSING_REQUIRED_FIELD');
			if (Result.isFailure(emailResult)) {
				return emailResult;
			}
			const email = command.email.trim();

			const user = await store.getUserByEmail(email, signal);
			if (!user?.passwordHash || !(await passwords.verify(user.passwordHash, command.password))) {
				logger.info({ userFound: user !== null }, 'Login rejected');
				return INVALID_CREDENTIALS;
			}

			const accessToken = await tokens.createContextEnrichedToken(user.email, tokens.accessTokenTtlMs, {}, signal);
			const refreshToken = await tokens.createRefreshToken({ sub: user.email }, undefined, signal);

			logger.info({ user: user.id }, 'User logged in');
			return Result.success({
				accessToken,
				refreshToken,
				tokenType: 'bearer' as const,
				expiresIn: Math.floor(tokens.accessTokenTtlMs / 1000),
			});
		},
	};
}
