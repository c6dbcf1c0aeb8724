/**
 * Context payload assembly
 *
 * Builds the claims of a context-enriched access token: the user's profile,
 * the active organization and team with the user's role in each, the merged
 * permissions of those roles, and the organizations and teams the user could
 * switch to.
 */

import type { Logger } from '@tenantgate/logging';
import { toRoleSummary, type RoleSummary, type Scope } from '../domain/index.js';
import type { DirectoryStore, MembershipStore } from '../infrastructure/persistence/index.js';
import type { EffectivePermissions, PermissionCache } from '../authorization/index.js';
import type { ClaimsInput } from './token/index.js';

export interface ActiveOrganizationClaim {
	readonly id: number;
	readonly name: string;
	/** Seconds since epoch */
	readonly creation_date: number;
	readonly user_role: RoleSummary;
}

export interface ActiveTeamClaim {
	readonly id: number;
	readonly name: string;
	readonly description: string | null;
	readonly organization_id: number;
	readonly user_role: RoleSummary;
}

/**
 * `sub` and `iat` always; the profile, `active_organization`, `active_team`,
 * `permissions`, `available_organizations` and `available_teams` unless the
 * context could not be assembled.
 */
export interface ContextClaims extends ClaimsInput {
	readonly iat: number;
}

export interface ActiveContext {
	readonly activeOrganizationId?: number | undefined;
	readonly activeTeamId?: number | undefined;
	readonly customClaims?: Readonly<Record<string, unknown>> | undefined;
}

export interface ContextPayloadAssembler {
	assemble(userEmail: string, context?: ActiveContext, signal?: AbortSignal): Promise<ContextClaims>;
}

export interface ContextPayloadDeps {
	readonly store: Pick<
		DirectoryStore & MembershipStore,
		| 'getUserByEmail'
		| 'getOrganizationById'
		| 'getTeamById'
		| 'getRoleOfUserInOrganization'
		| 'getRoleOfUserInTeam'
		| 'listOrganizationsOfUser'
		| 'listTeamsOfUser'
	>;
	readonly permissionCache: Pick<PermissionCache, 'resolve'>;
	readonly logger: Logger;
	readonly clock?: (() => Date) | undefined;
}

/** Claims the assembler owns; custom claims never set them. */
const CONTEXT_CLAIMS: ReadonlySet<string> = new Set([
	'sub',
	'email',
	'first_name',
	'last_name',
	'phone_number',
	'verified',
	'iat',
	'active_organization',
	'active_team',
	'permissions',
	'available_organizations',
	'available_teams',
]);

function customClaimsOf(context: ActiveContext): Record<string, unknown> {
	return Object.fromEntries(Object.entries(context.customClaims ?? {}).filter(([key]) => !CONTEXT_CLAIMS.has(key)));
}

function toSeconds(date: Date): number {
	return Math.floor(date.getTime() / 1000);
}

export function createContextPayloadAssembler(deps: ContextPayloadDeps): ContextPayloadAssembler {
	const { store, permissionCache, logger } = deps;
	const clock = deps.clock ?? (() => new Date());

	function mergePermissions(roles: ReadonlyArray<{ name: string; scope: Scope }>): EffectivePermissions {
		const merged: EffectivePermissions = {};
		// Later roles (team) replace earlier ones (organization) route by route
		for (const role of roles) {
			Object.assign(merged, permissionCache.resolve(role.name, role.scope));
		}
		return merged;
	}

	return {
		async assemble(userEmail, context = {}, signal) {
			const iat = toSeconds(clock());

			try {
				const user = await store.getUserByEmail(userEmail, signal);
				if (!user) {
					throw new Error('user not found');
				}

				const claims: Record<string, unknown> = {
					...customClaimsOf(context),
					sub: user.email,
					email: user.email,
					first_name: user.firstName,
					last_name: user.lastName,
					phone_number: user.phoneNumber,
					verified: user.verified,
					iat,
				};
				const roles: Array<{ name: string; scope: Scope }> = [];

				const { activeOrganizationId, activeTeamId } = context;
				if (activeOrganizationId !== undefined) {
					const [organization, role] = await Promise.all([
						store.getOrganizationById(activeOrganizationId, signal),
						store.getRoleOfUserInOrganization(user.id, activeOrganizationId, signal),
					]);
					if (organization && role) {
						const active: ActiveOrganizationClaim = {
							id: organization.id,
							name: organization.name,
							creation_date: toSeconds(organization.createdAt),
							user_role: toRoleSummary(role),
						};
						claims.active_organization = active;
						roles.push(role);
					}
				}

				if (activeTeamId !== undefined) {
					const [team, role] = await Promise.all([
						store.getTeamById(activeTeamId, signal),
						store.getRoleOfUserInTeam(user.id, activeTeamId, signal),
					]);
					if (team && role) {
						const active: ActiveTeamClaim = {
							id: team.id,
							name: team.name,
							description: team.description,
							organization_id: team.organizationId,
							user_role: toRoleSummary(role),
						};
						claims.active_team = active;
						roles.push(role);
					}
				}

				claims.permissions = mergePermissions(roles);

				const [organizations, teams] = await Promise.all([
					store.listOrganizationsOfUser(user.id, signal),
					store.listTeamsOfUser(user.id, activeOrganizationId, signal),
				]);
				claims.available_organizations = organizations.map((org) => ({ id: org.id, name: org.name }));
				claims.available_teams = teams.map((team) => ({
					id: team.id,
					name: team.name,
					organization_id: team.organizationId,
				}));

				return { ...claims, sub: user.email, iat };
			} catch (error) {
				logger.warn({ err: error, userEmail }, 'Could not assemble token context, issuing minimal claims');
				return { sub: userEmail, iat };
			}
		},
	};
}
