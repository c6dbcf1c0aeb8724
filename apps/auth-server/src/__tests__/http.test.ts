import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { createSilentLogger } from '@tenantgate/logging';

import { createContextPayloadAssembler, createHmacSigner, createTokenService, type TokenService } from '../auth/index.js';
import { createPermissionCache } from '../authorization/index.js';
import { createServerDeps } from '../composition.js';
import { buildServer } from '../server.js';
import { createInMemoryRbacStore, seed, type InMemoryRbacStore } from './support/in-memory-store.js';

describe('HTTP API', () => {
	let store: InMemoryRbacStore;
	let tokens: TokenService;
	let fastify: FastifyInstance;

	beforeEach(async () => {
		store = createInMemoryRbacStore();
		const rows = seed(store);
		rows.user(1, 'alice@example.com', { passwordHash: 'hashed:test-password' });
		rows.user(2, 'root@example.com');
		rows.organization(5, 'Acme');
		rows.team(9, 5, 'Platform');
		rows.role(1, 'super_admin', 'organization');
		rows.role(2, 'Member', 'organization');
		rows.role(3, 'Lead', 'team');
		rows.organizationMember(5, 1, 2);
		rows.teamMember(9, 1, 3);
		rows.globalRole(2, 1);

		const logger = createSilentLogger();
		const permissionCache = createPermissionCache({ store, logger });
		await permissionCache.refresh();
		tokens = createTokenService({
			signer: createHmacSigner({ secret: 'test-secret-0123456789', algorithm: 'HS256' }),
			refreshTokens: store,
			contextPayload: createContextPayloadAssembler({ store, permissionCache, logger }),
			accessTokenTtlMs: 15 * 60_000,
			refreshTokenTtlMs: 7 * 24 * 60 * 60_000,
			logger,
		});
		const passwords = {
			async hash(password: string) {
				return `hashed:${password}`;
			},
			async verify(hash: string, password: string) {
				return hash === `hashed:${password}`;
			},
		};

		fastify = await buildServer(createServerDeps({ store, permissionCache, tokenService: tokens, passwords, logger }), {
			docs: false,
		});
	});

	afterEach(async () => {
		await fastify.close();
	});

	async function authorization(email: string): Promise<{ authorization: string }> {
		return { authorization: `Bearer ${await tokens.createAccessToken({ sub: email })}` };
	}

	it('should report health without a token', async () => {
		const response = await fastify.inject({ method: 'GET', url: '/health' });

		expect(response.statusCode).toBe(200);
		expect(response.json()).toEqual({ status: 'UP', permissionCache: 'fallback' });
	});

	describe('auth', () => {
		it('should reject wrong credentials', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/auth/login',
				payload: { email: 'alice@example.com', password: 'wrong' },
			});

			expect(response.statusCode).toBe(401);
			expect(response.json()).toEqual({ code: 'INVALID_CREDENTIALS', message: 'Incorrect email or password' });
		});

		it('should reject a login body without a password', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/auth/login',
				payload: { email: 'alice@example.com' },
			});

			expect(response.statusCode).toBe(400);
			expect(response.json().code).toBe('VALIDATION_ERROR');
		});

		it('should log in and read the current context', async () => {
			const login = await fastify.inject({
				method: 'POST',
				url: '/auth/login',
				payload: { email: 'alice@example.com', password: 'test-password' },
			});
			expect(login.statusCode).toBe(200);
			const { accessToken, tokenType, expiresIn } = login.json();
			expect(tokenType).toBe('bearer');
			expect(expiresIn).toBe(900);

			const current = await fastify.inject({
				method: 'GET',
				url: '/rbac/context/current',
				headers: { authorization: `Bearer ${accessToken}` },
			});

			expect(current.statusCode).toBe(200);
			expect(current.json()).toEqual({
				activeOrganization: null,
				activeTeam: null,
				permissions: {},
				availableOrganizations: [{ id: 5, name: 'Acme' }],
				availableTeams: [{ id: 9, name: 'Platform', organization_id: 5 }],
			});
		});

		it('should refresh until the refresh token is revoked', async () => {
			const refreshToken = await tokens.createRefreshToken({ sub: 'alice@example.com' });

			const refreshed = await fastify.inject({ method: 'POST', url: '/auth/refresh', payload: { refreshToken } });
			const revoked = await fastify.inject({ method: 'POST', url: '/auth/revoke', payload: { refreshToken } });
			const refused = await fastify.inject({ method: 'POST', url: '/auth/refresh', payload: { refreshToken } });
			const unknown = await fastify.inject({
				method: 'POST',
				url: '/auth/revoke',
				payload: { refreshToken: 'unknown' },
			});

			expect(refreshed.statusCode).toBe(200);
			expect(refreshed.json().refreshToken).toBe(refreshToken);
			expect(revoked.statusCode).toBe(204);
			expect(refused.statusCode).toBe(401);
			expect(refused.json().code).toBe('INVALID_TOKEN');
			expect(unknown.statusCode).toBe(404);
			expect(unknown.json().code).toBe('TOKEN_NOT_FOUND');
		});
	});

	describe('context', () => {
		it('should switch to an organization the user belongs to', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/rbac/context/switch-organization',
				headers: await authorization('alice@example.com'),
				payload: { organizationId: 5 },
			});

			expect(response.statusCode).toBe(200);
			expect(response.json().context.activeOrganization).toEqual({
				id: 5,
				name: 'Acme',
				creation_date: 1704067200,
				user_role: { id: 2, name: 'Member', slug: 'member' },
			});
			expect(response.json().context.permissions).toEqual({ '/rbac/teams': ['GET'] });
		});

		it('should refuse an organization the user does not belong to', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/rbac/context/switch-organization',
				headers: await authorization('alice@example.com'),
				payload: { organizationId: 6 },
			});

			expect(response.statusCode).toBe(403);
			expect(response.json().code).toBe('ORGANIZATION_ACCESS_DENIED');
		});
	});

	describe('current role', () => {
		it("should report the caller's role in an organization and a team", async () => {
			const headers = await authorization('alice@example.com');

			const organization = await fastify.inject({
				method: 'GET',
				url: '/rbac/context/current-role/organization/5',
				headers,
			});
			const team = await fastify.inject({ method: 'GET', url: '/rbac/context/current-role/team/9', headers });
			const outside = await fastify.inject({
				method: 'GET',
				url: '/rbac/context/current-role/organization/6',
				headers,
			});

			expect(organization.statusCode).toBe(200);
			expect(organization.json()).toEqual({ organizationId: 5, role: { id: 2, name: 'Member', slug: 'member' } });
			expect(team.statusCode).toBe(200);
			expect(team.json()).toEqual({ teamId: 9, role: { id: 3, name: 'Lead', slug: 'lead' } });
			expect(outside.statusCode).toBe(404);
			expect(outside.json().code).toBe('MEMBERSHIP_NOT_FOUND');
		});
	});

	describe('authorization', () => {
		it('should answer 401 for a refresh token used as a bearer token', async () => {
			const refreshToken = await tokens.createRefreshToken({ sub: 'alice@example.com' });
			await tokens.revokeRefreshToken(refreshToken);

			const response = await fastify.inject({
				method: 'GET',
				url: '/rbac/organizations/5/teams',
				headers: { authorization: `Bearer ${refreshToken}` },
			});

			expect(response.statusCode).toBe(401);
			expect(response.json()).toEqual({ code: 'NOT_AUTHENTICATED', message: 'Not authenticated' });
		});

		it('should answer 401 without a token', async () => {
			const response = await fastify.inject({ method: 'GET', url: '/rbac/organizations/5/teams' });

			expect(response.statusCode).toBe(401);
			expect(response.json()).toEqual({ code: 'NOT_AUTHENTICATED', message: 'Not authenticated' });
		});

		it('should let a member list the teams of their organization', async () => {
			const response = await fastify.inject({
				method: 'GET',
				url: '/rbac/organizations/5/teams',
				headers: await authorization('alice@example.com'),
			});

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({
				teams: [
					{ id: 9, organizationId: 5, name: 'Platform', description: null, createdAt: '2024-01-01T00:00:00.000Z' },
				],
				total: 1,
			});
		});

		it('should deny what the member role does not grant', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/rbac/organizations/5/teams/create',
				headers: await authorization('alice@example.com'),
				payload: { name: 'Payments' },
			});

			expect(response.statusCode).toBe(403);
			expect(response.json()).toEqual({ code: 'PERMISSION_DENIED', message: 'Permission denied' });
			expect(store.data.teams).toHaveLength(1);
		});

		it('should deny a user outside the organization', async () => {
			const response = await fastify.inject({
				method: 'GET',
				url: '/rbac/organizations/6/teams',
				headers: await authorization('alice@example.com'),
			});

			expect(response.statusCode).toBe(403);
			expect(response.json().code).toBe('NOT_A_MEMBER');
		});

		it('should deny an unscoped route to a regular user', async () => {
			const response = await fastify.inject({
				method: 'GET',
				url: '/rbac/roles',
				headers: await authorization('alice@example.com'),
			});

			expect(response.statusCode).toBe(403);
			expect(response.json()).toEqual({ code: 'INSUFFICIENT_SCOPE', message: 'insufficient scope' });
		});

		it('should answer 500 when the store fails', async () => {
			const headers = await authorization('alice@example.com');
			store.failWith(new Error('connection reset'));

			const response = await fastify.inject({ method: 'GET', url: '/rbac/organizations/5/teams', headers });

			expect(response.statusCode).toBe(500);
			expect(response.json()).toEqual({ code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' });
		});
	});

	describe('administration', () => {
		it('should let a super admin create and list roles', async () => {
			const headers = await authorization('root@example.com');

			const created = await fastify.inject({
				method: 'POST',
				url: '/rbac/roles',
				headers,
				payload: { name: 'Auditor', scope: 'team' },
			});
			const listed = await fastify.inject({ method: 'GET', url: '/rbac/roles?scope=team', headers });

			expect(created.statusCode).toBe(201);
			expect(created.json()).toMatchObject({ name: 'Auditor', slug: 'auditor', scope: 'team', inheritsRoleId: null });
			expect(listed.statusCode).toBe(200);
			expect(listed.json().roles.map((role: { name: string }) => role.name)).toEqual(['Lead', 'Auditor']);
			expect(listed.json().total).toBe(2);
		});

		it('should reject an invalid role body', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/rbac/roles',
				headers: await authorization('root@example.com'),
				payload: { name: 'Auditor', scope: 'global' },
			});

			expect(response.statusCode).toBe(400);
			expect(response.json().code).toBe('VALIDATION_ERROR');
		});

		it('should remove a user from an organization and its teams', async () => {
			const response = await fastify.inject({
				method: 'DELETE',
				url: '/rbac/organizations/5/remove-user',
				headers: await authorization('root@example.com'),
				payload: { userEmail: 'alice@example.com' },
			});

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({ organizationId: 5, userId: 1 });
			expect(store.data.organizationUsers).toEqual([]);
			expect(store.data.teamMembers).toEqual([]);
		});

		it('should rebuild the cache on request', async () => {
			const response = await fastify.inject({
				method: 'POST',
				url: '/rbac/permissions/cache/refresh',
				headers: await authorization('root@example.com'),
			});

			expect(response.statusCode).toBe(200);
			expect(response.json()).toEqual({ refreshed: true, source: 'fallback' });
		});
	});
});
