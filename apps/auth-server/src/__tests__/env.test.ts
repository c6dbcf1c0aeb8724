import { describe, it, expect } from 'vitest';

import { corsOrigins, loadEnv, tokenSignerConfig } from '../env.js';

const SECRET = 'test-secret-0123456789';

describe('loadEnv', () => {
	it('should apply defaults around a token secret', () => {
		const env = loadEnv({ TOKEN_SECRET: SECRET });

		expect(env.PORT).toBe(3000);
		expect(env.TOKEN_STRATEGY).toBe('hmac');
		expect(env.ACCESS_TOKEN_EXPIRE_MINUTES).toBe(15);
		expect(env.REFRESH_TOKEN_EXPIRE_DAYS).toBe(7);
		expect(env.LOG_PRETTY).toBe(false);
		expect(tokenSignerConfig(env)).toEqual({ strategy: 'hmac', secret: SECRET, algorithm: 'HS256' });
	});

	it('should require a long enough secret for the hmac strategy', () => {
		expect(() => loadEnv({ TOKEN_SECRET: 'short' })).toThrow(
			'TOKEN_SECRET: required for the hmac strategy, at least 16 characters',
		);
	});

	it('should require both keys for the asymmetric strategy', () => {
		expect(() => loadEnv({ TOKEN_STRATEGY: 'asymmetric', TOKEN_PUBLIC_KEY: 'public' })).toThrow(
			'TOKEN_PRIVATE_KEY: TOKEN_PRIVATE_KEY or TOKEN_PRIVATE_KEY_PATH is required for the asymmetric strategy',
		);
	});

	it('should unescape inline keys', () => {
		const env = loadEnv({
			TOKEN_STRATEGY: 'asymmetric',
			TOKEN_PRIVATE_KEY: 'private-1\\nprivate-2',
			TOKEN_PUBLIC_KEY: 'public-1\\npublic-2',
		});

		expect(tokenSignerConfig(env)).toEqual({
			strategy: 'asymmetric',
			privateKeyPem: 'private-1\nprivate-2',
			publicKeyPem: 'public-1\npublic-2',
		});
	});

	it('should require the bootstrap email and password together', () => {
		expect(() => loadEnv({ TOKEN_SECRET: SECRET, BOOTSTRAP_ADMIN_EMAIL: 'root@example.com' })).toThrow(
			'BOOTSTRAP_ADMIN_PASSWORD: BOOTSTRAP_ADMIN_EMAIL and BOOTSTRAP_ADMIN_PASSWORD must be set together',
		);
	});

	it('should split the allowed origins', () => {
		const env = loadEnv({ TOKEN_SECRET: SECRET, CORS_ORIGINS: ' https://a.example , ,https://b.example' });

		expect(corsOrigins(env)).toEqual(['https://a.example', 'https://b.example']);
		expect(corsOrigins(loadEnv({ TOKEN_SECRET: SECRET }))).toEqual([]);
	});
});
