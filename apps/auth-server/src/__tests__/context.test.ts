import { describe, it, expect, beforeEach } from 'vitest';
import { Result } from '@tenantgate/application';
import { createSilentLogger } from '@tenantgate/logging';

import { createContextPayloadAssembler, createHmacSigner, createTokenService, type TokenService } from '../auth/index.js';
import { createPermissionCache, type PermissionCache } from '../authorization/index.js';
import { contextViewOf, createContextSwitchService, type ContextSwitchService } from '../context/index.js';
import type { User } from '../domain/index.js';
import { createInMemoryRbacStore, seed, type InMemoryRbacStore } from './support/in-memory-store.js';

const NOW = new Date('2025-03-01T12:00:00.000Z');
const NOW_SECONDS = 1740830400;

const ACME = { id: 5, name: 'Acme', creation_date: 1704067200, user_role: { id: 2, name: 'Admin', slug: 'admin' } };
const PLATFORM_TEAM = {
	id: 9,
	name: 'Platform',
	description: null,
	organization_id: 5,
	user_role: { id: 3, name: 'Lead', slug: 'lead' },
};

describe('context', () => {
	let store: InMemoryRbacStore;
	let permissionCache: PermissionCache;
	let tokens: TokenService;
	let service: ContextSwitchService;
	let alice: User;

	beforeEach(async () => {
		store = createInMemoryRbacStore(() => NOW);
		const rows = seed(store);
		alice = rows.user(1, 'alice@example.com', { firstName: 'Alice' });
		rows.organization(5, 'Acme');
		rows.organization(7, 'Globex');
		rows.role(2, 'Admin', 'organization');
		rows.role(3, 'Lead', 'team');
		rows.team(9, 5, 'Platform');
		rows.team(10, 5, 'Payments');
		rows.team(11, 7, 'Research');
		rows.organizationMember(5, 1, 2);
		rows.teamMember(9, 1, 3);
		rows.teamMember(11, 1, 3);

		const logger = createSilentLogger();
		permissionCache = createPermissionCache({ store, logger });
		await permissionCache.refresh();

		tokens = createTokenService({
			signer: createHmacSigner({ secret: 'test-secret-0123456789', algorithm: 'HS256' }),
			refreshTokens: store,
			contextPayload: createContextPayloadAssembler({ store, permissionCache, logger, clock: () => NOW }),
			accessTokenTtlMs: 15 * 60_000,
			refreshTokenTtlMs: 7 * 24 * 60 * 60_000,
			logger,
			clock: () => NOW,
		});
		service = createContextSwitchService({ store, tokens, logger });
	});

	describe('context payload', () => {
		it('should describe the active organization and team with merged permissions', async () => {
			const { claims } = await tokens.issueContextEnrichedToken('alice@example.com', undefined, {
				activeOrganizationId: 5,
				activeTeamId: 9,
			});

			expect(claims).toEqual({
				sub: 'alice@example.com',
				email: 'alice@example.com',
				first_name: 'Alice',
				last_name: null,
				phone_number: null,
				verified: true,
				iat: NOW_SECONDS,
				active_organization: ACME,
				active_team: PLATFORM_TEAM,
				permissions: {
					'/rbac/teams/create': ['POST'],
					'/rbac/teams/assign-user': ['POST'],
					'/rbac/teams/remove-user': ['DELETE'],
					'/rbac/teams': ['GET'],
				},
				available_organizations: [{ id: 5, name: 'Acme' }],
				available_teams: [{ id: 9, name: 'Platform', organization_id: 5 }],
				token_use: 'access',
				exp: '2025-03-01T12:15:00.000Z',
			});
		});

		it('should leave out an organization the user does not belong to', async () => {
			const { claims } = await tokens.issueContextEnrichedToken('alice@example.com', undefined, {
				activeOrganizationId: 7,
			});

			expect(claims['active_organization']).toBeUndefined();
			expect(claims['permissions']).toEqual({});
			expect(claims['available_teams']).toEqual([{ id: 11, name: 'Research', organization_id: 7 }]);
		});

		it('should merge custom claims without overriding the computed ones', async () => {
			const { claims } = await tokens.issueContextEnrichedToken('alice@example.com', undefined, {
				customClaims: {
					sub: 'mallory@example.com',
					tenant_hint: 'acme',
					permissions: { '*': ['DELETE'] },
					active_organization: { id: 99 },
					token_use: 'refresh',
				},
			});

			expect(claims.sub).toBe('alice@example.com');
			expect(claims['tenant_hint']).toBe('acme');
			expect(claims['permissions']).toEqual({});
			expect(claims['active_organization']).toBeUndefined();
			expect(claims.token_use).toBe('access');
		});

		it('should fall back to minimal claims when the context cannot be read', async () => {
			const { claims } = await tokens.issueContextEnrichedToken('nobody@example.com');

			expect(claims).toEqual({
				sub: 'nobody@example.com',
				iat: NOW_SECONDS,
				token_use: 'access',
				exp: '2025-03-01T12:15:00.000Z',
			});
		});

		it('should fall back to minimal claims when the store fails', async () => {
			store.failWith(new Error('connection reset'));

			const { claims } = await tokens.issueContextEnrichedToken('alice@example.com');

			expect(claims).toEqual({
				sub: 'alice@example.com',
				iat: NOW_SECONDS,
				token_use: 'access',
				exp: '2025-03-01T12:15:00.000Z',
			});
		});
	});

	describe('switching', () => {
		it('should deny an organization the user is not a member of', async () => {
			const result = await service.switchOrganization(alice, 7);

			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.type).toBe('forbidden');
				expect(result.error.code).toBe('ORGANIZATION_ACCESS_DENIED');
				expect(result.error.message).toBe('Access denied to organization');
			}
		});

		it('should deny a team the user is not a member of before looking it up', async () => {
			const missing = await service.switchTeam(alice, 404);
			const notMember = await service.switchTeam(alice, 10);

			expect(Result.isFailure(missing) && missing.error.code).toBe('TEAM_ACCESS_DENIED');
			expect(Result.isFailure(notMember) && notMember.error.code).toBe('TEAM_ACCESS_DENIED');
		});

		it('should refuse a team outside the requested organization', async () => {
			const result = await service.switchContext(alice, { organizationId: 5, teamId: 11 });

			expect(Result.isFailure(result)).toBe(true);
			if (Result.isFailure(result)) {
				expect(result.error.type).toBe('validation');
				expect(result.error.code).toBe('TEAM_NOT_IN_ORGANIZATION');
				expect(result.error.details).toEqual({ teamId: 11, organizationId: 5 });
			}
		});

		it('should activate the organization of the selected team', async () => {
			const result = await service.switchTeam(alice, 9);

			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value.tokenType).toBe('bearer');
				expect(result.value.expiresIn).toBe(900);
				expect(result.value.context.activeOrganization).toEqual(ACME);
				expect(result.value.context.activeTeam).toEqual(PLATFORM_TEAM);

				const verified = await tokens.verifyToken(result.value.accessToken);
				expect(verified?.['active_team']).toEqual(PLATFORM_TEAM);
			}
		});

		it('should switch to an organization alone', async () => {
			const result = await service.switchOrganization(alice, 5);

			expect(Result.isSuccess(result)).toBe(true);
			if (Result.isSuccess(result)) {
				expect(result.value.context).toEqual({
					activeOrganization: ACME,
					activeTeam: null,
					permissions: {
						'/rbac/teams/create': ['POST'],
						'/rbac/teams/assign-user': ['POST'],
						'/rbac/teams/remove-user': ['DELETE'],
						'/rbac/teams': ['GET'],
					},
					availableOrganizations: [{ id: 5, name: 'Acme' }],
					availableTeams: [{ id: 9, name: 'Platform', organization_id: 5 }],
				});
			}
		});
	});

	describe('queries', () => {
		it('should read the current context from claims, with defaults', () => {
			const claims = { sub: 'alice@example.com', token_use: 'access', exp: '2025-03-01T12:15:00.000Z' } as const;

			expect(service.getCurrentContext(claims)).toEqual({
				activeOrganization: null,
				activeTeam: null,
				permissions: {},
				availableOrganizations: [],
				availableTeams: [],
			});
			expect(contextViewOf({ active_team: PLATFORM_TEAM }).activeTeam).toEqual(PLATFORM_TEAM);
		});

		it('should list every organization and team of the user', async () => {
			expect(await service.getAvailableContexts(alice)).toEqual({
				organizations: [{ id: 5, name: 'Acme' }],
				teams: [
					{ id: 9, name: 'Platform', organizationId: 5 },
					{ id: 11, name: 'Research', organizationId: 7 },
				],
			});
		});

		it("should report the user's role in an organization and a team", async () => {
			const organization = await service.getRoleInOrganization(alice, 5);
			const team = await service.getRoleInTeam(alice, 9);

			expect(Result.isSuccess(organization) && organization.value).toEqual({
				organizationId: 5,
				role: { id: 2, name: 'Admin', slug: 'admin' },
			});
			expect(Result.isSuccess(team) && team.value).toEqual({ teamId: 9, role: { id: 3, name: 'Lead', slug: 'lead' } });
		});

		it('should report no role where the user is not a member', async () => {
			const organization = await service.getRoleInOrganization(alice, 7);
			const team = await service.getRoleInTeam(alice, 10);

			expect(Result.isFailure(organization) && organization.error.code).toBe('MEMBERSHIP_NOT_FOUND');
			expect(Result.isFailure(team) && team.error.type).toBe('not_found');
		});
	});
});
