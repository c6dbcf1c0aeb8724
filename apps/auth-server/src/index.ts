/**
 * Auth Server
 *
 * Entry point: load configuration, connect to the database, build the
 * permission cache and token service, bootstrap the super admin and listen.
 */

import type { FastifyInstance } from 'fastify';
import { createDatabase } from '@tenantgate/persistence';
import { createComponentLogger, createLogger } from '@tenantgate/logging';

import { corsOrigins, getEnv, isDevelopment, tokenSignerConfig } from './env.js';
import {
	createArgon2PasswordHasher,
	createContextPayloadAssembler,
	createTokenService,
	createTokenSigner,
} from './auth/index.js';
import { createPermissionCache } from './authorization/index.js';
import { bootstrapSuperAdmin } from './bootstrap/index.js';
import { createServerDeps } from './composition.js';
import { createDrizzleRbacStore } from './infrastructure/persistence/index.js';
import { buildServer } from './server.js';

const MINUTE_MS = 60_000;
const DAY_MS = 24 * 60 * MINUTE_MS;

export async function startServer(): Promise<FastifyInstance> {
	const env = getEnv();
	const loggerConfig = { level: env.LOG_LEVEL, serviceName: 'auth-server', pretty: env.LOG_PRETTY };
	const logger = createLogger(loggerConfig);

	logger.info({ env: env.NODE_ENV, tokenStrategy: env.TOKEN_STRATEGY }, 'Starting auth server');

	const database = createDatabase({
		url: env.DATABASE_URL,
		maxConnections: env.DB_POOL_SIZE,
		queryLogger: env.LOG_LEVEL === 'trace' ? createComponentLogger(logger, 'sql') : undefined,
	});
	const store = createDrizzleRbacStore(database.db);

	const permissionCache = createPermissionCache({
		store,
		logger: createComponentLogger(logger, 'permission-cache'),
	});
	if (!(await permissionCache.refresh())) {
		await database.close();
		throw new Error('Could not build the permission cache');
	}

	const tokenService = createTokenService({
		signer: await createTokenSigner(tokenSignerConfig(env)),
		refreshTokens: store,
		contextPayload: createContextPayloadAssembler({
			store,
			permissionCache,
			logger: createComponentLogger(logger, 'context-payload'),
		}),
		accessTokenTtlMs: env.ACCESS_TOKEN_EXPIRE_MINUTES * MINUTE_MS,
		refreshTokenTtlMs: env.REFRESH_TOKEN_EXPIRE_DAYS * DAY_MS,
		logger: createComponentLogger(logger, 'tokens'),
	});
	const passwords = createArgon2PasswordHasher();

	if (env.BOOTSTRAP_ADMIN_EMAIL !== undefined && env.BOOTSTRAP_ADMIN_PASSWORD !== undefined) {
		const outcome = await bootstrapSuperAdmin(
			{ store, passwords, logger: createComponentLogger(logger, 'bootstrap') },
			{ email: env.BOOTSTRAP_ADMIN_EMAIL, password: env.BOOTSTRAP_ADMIN_PASSWORD },
		);
		if (outcome.roleCreated && !(await permissionCache.refresh())) {
			logger.warn('Permission cache not refreshed after bootstrap');
		}
	}

	const fastify = await buildServer(
		createServerDeps({ store, permissionCache, tokenService, passwords, logger }),
		{
			logging: loggerConfig,
			requestTimeoutMs: env.REQUEST_TIMEOUT_MS,
			corsOrigins: corsOrigins(env),
		},
	);

	fastify.addHook('onClose', async () => {
		await database.close();
	});

	for (const signal of ['SIGINT', 'SIGTERM'] as const) {
		process.once(signal, () => {
			logger.info({ signal }, 'Shutting down');
			fastify.close().then(
				() => process.exit(0),
				(error: unknown) => {
					logger.error({ err: error }, 'Shutdown failed');
					process.exit(1);
				},
			);
		});
	}

	await fastify.listen({ port: env.PORT, host: env.HOST });

	if (isDevelopment()) {
		logger.info(
			{ docs: `http://localhost:${env.PORT}/docs`, health: `http://localhost:${env.PORT}/health` },
			'Auth server ready',
		);
	}

	return fastify;
}

startServer().catch((error: unknown) => {
	console.error('Failed to start auth server:', error);
	process.exit(1);
});
