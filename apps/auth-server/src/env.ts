/**
 * Environment Configuration
 *
 * Loads and validates environment variables for the auth server.
 */

import { CommonEnvSchemas, parseEnv, positiveInt, readInlineOrFile, z } from '@tenantgate/config';
import { HMAC_ALGORITHMS, type TokenSignerConfig } from './auth/index.js';

const envSchema = z
	.object({
		// Server
		PORT: CommonEnvSchemas.port,
		HOST: z.string().default('0.0.0.0'),
		NODE_ENV: CommonEnvSchemas.nodeEnv,
		REQUEST_TIMEOUT_MS: positiveInt(10_000),
		/** Comma-separated allowed origins */
		CORS_ORIGINS: CommonEnvSchemas.optionalString,

		// Database
		DATABASE_URL: z.string().default('postgres://localhost:5432/tenantgate'),
		DB_POOL_SIZE: positiveInt(10),

		// Logging
		LOG_LEVEL: CommonEnvSchemas.logLevel,
		LOG_PRETTY: CommonEnvSchemas.boolean,

		// Tokens
		TOKEN_STRATEGY: z.enum(['hmac', 'asymmetric']).default('hmac'),
		TOKEN_SECRET: CommonEnvSchemas.optionalString,
		TOKEN_ALGORITHM: z.enum(HMAC_ALGORITHMS).default('HS256'),
		TOKEN_PRIVATE_KEY: CommonEnvSchemas.optionalString,
		TOKEN_PUBLIC_KEY: CommonEnvSchemas.optionalString,
		TOKEN_PRIVATE_KEY_PATH: CommonEnvSchemas.optionalString,
		TOKEN_PUBLIC_KEY_PATH: CommonEnvSchemas.optionalString,
		ACCESS_TOKEN_EXPIRE_MINUTES: positiveInt(15),
		REFRESH_TOKEN_EXPIRE_DAYS: positiveInt(7),

		// Bootstrap super admin (first-run setup)
		BOOTSTRAP_ADMIN_EMAIL: CommonEnvSchemas.optionalString,
		BOOTSTRAP_ADMIN_PASSWORD: CommonEnvSchemas.optionalString,
	})
	.check((ctx) => {
		const env = ctx.value;
		if (env.TOKEN_STRATEGY === 'hmac' && (env.TOKEN_SECRET === undefined || env.TOKEN_SECRET.length < 16)) {
			ctx.issues.push({
				code: 'custom',
				path: ['TOKEN_SECRET'],
				message: 'required for the hmac strategy, at least 16 characters',
				input: env.TOKEN_SECRET,
			});
		}
		if (env.TOKEN_STRATEGY === 'asymmetric') {
			if (env.TOKEN_PRIVATE_KEY === undefined && env.TOKEN_PRIVATE_KEY_PATH === undefined) {
				ctx.issues.push({
					code: 'custom',
					path: ['TOKEN_PRIVATE_KEY'],
					message: 'TOKEN_PRIVATE_KEY or TOKEN_PRIVATE_KEY_PATH is required for the asymmetric strategy',
					input: undefined,
				});
			}
			if (env.TOKEN_PUBLIC_KEY === undefined && env.TOKEN_PUBLIC_KEY_PATH === undefined) {
				ctx.issues.push({
					code: 'custom',
					path: ['TOKEN_PUBLIC_KEY'],
					message: 'TOKEN_PUBLIC_KEY or TOKEN_PUBLIC_KEY_PATH is required for the asymmetric strategy',
					input: undefined,
				});
			}
		}
		if ((env.BOOTSTRAP_ADMIN_EMAIL === undefined) !== (env.BOOTSTRAP_ADMIN_PASSWORD === undefined)) {
			ctx.issues.push({
				code: 'custom',
				path: ['BOOTSTRAP_ADMIN_PASSWORD'],
				message: 'BOOTSTRAP_ADMIN_EMAIL and BOOTSTRAP_ADMIN_PASSWORD must be set together',
				input: undefined,
			});
		}
	});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * Parse and validate `source` without caching.
 */
export function loadEnv(source: Record<string, string | undefined> = process.env): Env {
	return parseEnv(envSchema, source);
}

export function getEnv(): Env {
	if (!cachedEnv) {
		cachedEnv = loadEnv();
	}
	return cachedEnv;
}

export function isDevelopment(): boolean {
	return getEnv().NODE_ENV === 'development';
}

export function corsOrigins(env: Env): string[] {
	return (env.CORS_ORIGINS ?? '')
		.split(',')
		.map((origin) => origin.trim())
		.filter((origin) => origin !== '');
}

/**
 * Signer configuration for the selected strategy. PEM keys are read from the
 * inline variables first, then from the key files.
 */
export function tokenSignerConfig(env: Env): TokenSignerConfig {
	if (env.TOKEN_STRATEGY === 'hmac') {
		return { strategy: 'hmac', secret: env.TOKEN_SECRET ?? '', algorithm: env.TOKEN_ALGORITHM };
	}

	const privateKeyPem = readInlineOrFile(env.TOKEN_PRIVATE_KEY, env.TOKEN_PRIVATE_KEY_PATH);
	const publicKeyPem = readInlineOrFile(env.TOKEN_PUBLIC_KEY, env.TOKEN_PUBLIC_KEY_PATH);
	if (privateKeyPem === undefined || publicKeyPem === undefined) {
		throw new Error('Asymmetric token strategy needs both a private and a public key');
	}
	return { strategy: 'asymmetric', privateKeyPem, publicKeyPem };
}
