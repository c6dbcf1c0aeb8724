/**
 * Context Switch Service
 *
 * Mints a new context-enriched access token for the organization and/or team
 * the user wants to act in, after checking the user belongs there.
 *
 * Checks run in order: organization membership, team membership, then that
 * the team belongs to the requested organization. Switching organization
 * clears the active team; switching team activates the team's organization.
 *
 * Also answers which role the user holds in a given organization or team.
 */

import { Result, UseCaseError } from '@tenantgate/domain-core';
import type { Logger } from '@tenantgate/logging';
import { toRoleSummary, type OrganizationSummary, type RoleSummary, type TeamSummary, type User } from '../domain/index.js';
import type { DirectoryStore, MembershipStore } from '../infrastructure/persistence/index.js';
import type { TokenClaims, TokenService } from '../auth/index.js';

/**
 * Active context as carried in the token claims.
 */
export interface ContextView {
	readonly activeOrganization: unknown;
	readonly activeTeam: unknown;
	readonly permissions: unknown;
	readonly availableOrganizations: unknown;
	readonly availableTeams: unknown;
}

export interface ContextToken {
	readonly accessToken: string;
	readonly tokenType: 'bearer';
	/** Seconds */
	readonly expiresIn: number;
	readonly context: ContextView;
}

export interface ContextTarget {
	readonly organizationId?: number | undefined;
	readonly teamId?: number | undefined;
}

export interface AvailableContexts {
	readonly organizations: OrganizationSummary[];
	readonly teams: TeamSummary[];
}

export interface OrganizationRole {
	readonly organizationId: number;
	readonly role: RoleSummary;
}

export interface TeamRole {
	readonly teamId: number;
	readonly role: RoleSummary;
}

export interface ContextSwitchService {
	switchOrganization(user: User, organizationId: number, signal?: AbortSignal): Promise<Result<ContextToken>>;
	switchTeam(user: User, teamId: number, signal?: AbortSignal): Promise<Result<ContextToken>>;
	switchContext(user: User, target: ContextTarget, signal?: AbortSignal): Promise<Result<ContextToken>>;
	getCurrentContext(claims: TokenClaims): ContextView;
	getAvailableContexts(user: User, signal?: AbortSignal): Promise<AvailableContexts>;
	getRoleInOrganization(user: User, organizationId: number, signal?: AbortSignal): Promise<Result<OrganizationRole>>;
	getRoleInTeam(user: User, teamId: number, signal?: AbortSignal): Promise<Result<TeamRole>>;
}

export interface ContextSwitchServiceDeps {
	readonly store: Pick<
		DirectoryStore & MembershipStore,
		'getTeamById' | 'getRoleOfUserInOrganization' | 'getRoleOfUserInTeam' | 'listOrganizationsOfUser' | 'listTeamsOfUser'
	>;
	readonly tokens: Pick<TokenService, 'issueContextEnrichedToken' | 'accessTokenTtlMs'>;
	readonly logger: Logger;
}

/**
 * Pull the context fields out of a token's claims. Absent fields read as
 * null, except `permissions` which reads as an empty object.
 */
export function contextViewOf(claims: Readonly<Record<string, unknown>>): ContextView {
	return {
		activeOrganization: claims['active_organization'] ?? null,
		activeTeam: claims['active_team'] ?? null,
		permissions: claims['permissions'] ?? {},
		availableOrganizations: claims['available_organizations'] ?? [],
		availableTeams: claims['available_teams'] ?? [],
	};
}

export function createContextSwitchService(deps: ContextSwitchServiceDeps): ContextSwitchService {
	const { store, tokens, logger } = deps;

	async function switchContext(user: User, target: ContextTarget, signal?: AbortSignal): Promise<Result<ContextToken>> {
		const { organizationId, teamId } = target;

		if (organizationId !== undefined) {
			const role = await store.getRoleOfUserInOrganization(user.id, organizationId, signal);
			if (!role) {
				return Result.failure(
					UseCaseError.forbidden('ORGANIZATION_ACCESS_DENIED', 'Access denied to organization', { organizationId }),
				);
			}
		}

		let activeOrganizationId = organizationId;
		if (teamId !== undefined) {
			const role = await store.getRoleOfUserInTeam(user.id, teamId, signal);
			if (!role) {
				return Result.failure(UseCaseError.forbidden('TEAM_ACCESS_DENIED', 'Access denied to team', { teamId }));
			}

			const team = await store.getTeamById(teamId, signal);
			if (!team) {
				return Result.failure(UseCaseError.notFound('TEAM_NOT_FOUND', 'Team not found', { teamId }));
			}
			if (organizationId !== undefined && team.organizationId !== organizationId) {
				return Result.failure(
					UseCaseError.validation('TEAM_NOT_IN_ORGANIZATION', 'Team does not belong to the specified organization', {
						teamId,
						organizationId,
					}),
				);
			}
			activeOrganizationId = team.organizationId;
		}

		const { token, claims } = await tokens.issueContextEnrichedToken(
			user.email,
			tokens.accessTokenTtlMs,
			{ activeOrganizationId, activeTeamId: teamId },
			signal,
		);
		logger.info({ user: user.id, organizationId: activeOrganizationId, teamId }, 'Context switched');

		return Result.success({
			accessToken: token,
			tokenType: 'bearer' as const,
			expiresIn: Math.floor(tokens.accessTokenTtlMs / 1000),
			context: contextViewOf(claims),
		});
	}

	return {
		switchContext,

		async switchOrganization(user, organizationId, signal) {
			return switchContext(user, { organizationId }, signal);
		},

		async switchTeam(user, teamId, signal) {
			return switchContext(user, { teamId }, signal);
		},

		getCurrentContext(claims) {
			return contextViewOf(claims);
		},

		async getAvailableContexts(user, signal) {
			const [organizations, teams] = await Promise.all([
				store.listOrganizationsOfUser(user.id, signal),
				store.listTeamsOfUser(user.id, undefined, signal),
			]);
			return { organizations, teams };
		},

		async getRoleInOrganization(user, organizationId, signal) {
			const role = await store.getRoleOfUserInOrganization(user.id, organizationId, signal);
			if (!role) {
				return Result.failure(
					UseCaseError.notFound('MEMBERSHIP_NOT_FOUND', 'User is not part of the organization', { organizationId }),
				);
			}
			return Result.success({ organizationId, role: toRoleSummary(role) });
		},

		async getRoleInTeam(user, teamId, signal) {
			const role = await store.getRoleOfUserInTeam(user.id, teamId, signal);
			if (!role) {
				return Result.failure(UseCaseError.notFound('MEMBERSHIP_NOT_FOUND', 'User is not part of the team', { teamId }));
			}
			return Result.success({ teamId, role: toRoleSummary(role) });
		},
	};
}
