/**
 * Request authorization pipeline
 *
 * Decides, per request, between allow and a 401/403/500 denial:
 *
 * 1. Public paths pass; context paths need only a principal.
 * 2. The bearer token must verify and name an existing user.
 * 3. A user holding the global `super_admin` role is checked against the
 *    super-admin entry before any scope is required.
 * 4. The path must carry an organization or team id.
 * 5. The user must be a member there; their role is resolved with inheritance.
 * 6. The normalised route key and method must be granted.
 *
 * Anything unexpected is a 500 with a generic message; details go to the log.
 */

import { extractBearerToken } from '@tenantgate/http';
import type { Logger } from '@tenantgate/logging';
import { SUPER_ADMIN, type Role, type Scope, type User } from '../domain/index.js';
import type { DirectoryStore, MembershipStore, RoleStore } from '../infrastructure/persistence/index.js';
import type { TokenClaims } from '../auth/index.js';
import type { PermissionCache } from './permission-cache.js';
import { isAllowed } from './effective-permissions.js';
import { AUTHENTICATED_PREFIXES, PUBLIC_PREFIXES, classifyScope, matchesPrefix, pathOf, routeKey } from './route-scope.js';

export interface AuthenticatedPrincipal {
	readonly user: User;
	readonly claims: TokenClaims;
}

export interface AuthorizationRequest {
	readonly method: string;
	/** Request URL; a query string is ignored */
	readonly url: string;
	readonly authorization: string | undefined;
	readonly signal?: AbortSignal | undefined;
}

export type AuthorizationDecision =
	| {
			readonly outcome: 'allow';
			readonly principal: AuthenticatedPrincipal | null;
			readonly scope?: Scope | typeof SUPER_ADMIN | undefined;
			readonly contextId?: number | undefined;
			readonly role?: string | undefined;
	  }
	| {
			readonly outcome: 'deny';
			readonly status: 401 | 403 | 500;
			readonly code: string;
			readonly message: string;
	  };

export interface AuthorizeRequestDeps {
	readonly tokens: { verifyToken(token: string): Promise<TokenClaims | null> };
	readonly store: Pick<
		DirectoryStore & MembershipStore & RoleStore,
		'getUserByEmail' | 'listGlobalRolesOfUser' | 'getRoleOfUserInOrganization' | 'getRoleOfUserInTeam'
	>;
	readonly permissionCache: Pick<PermissionCache, 'resolve'>;
	readonly logger: Logger;
}

const NOT_AUTHENTICATED = {
	outcome: 'deny',
	status: 401,
	code: 'NOT_AUTHENTICATED',
	message: 'Not authenticated',
} as const satisfies AuthorizationDecision;

const INSUFFICIENT_SCOPE = {
	outcome: 'deny',
	status: 403,
	code: 'INSUFFICIENT_SCOPE',
	message: 'insufficient scope',
} as const satisfies AuthorizationDecision;

const PERMISSION_DENIED = {
	outcome: 'deny',
	status: 403,
	code: 'PERMISSION_DENIED',
	message: 'Permission denied',
} as const satisfies AuthorizationDecision;

const INTERNAL_ERROR = {
	outcome: 'deny',
	status: 500,
	code: 'INTERNAL_ERROR',
	message: 'An unexpected error occurred',
} as const satisfies AuthorizationDecision;

/**
 * Resolve the request's principal from its bearer access token, or null.
 */
export async function extractPrincipal(
	deps: Pick<AuthorizeRequestDeps, 'tokens' | 'store'>,
	authorization: string | undefined,
	signal?: AbortSignal,
): Promise<AuthenticatedPrincipal | null> {
	const token = extractBearerToken(authorization);
	if (!token) return null;

	const claims = await deps.tokens.verifyToken(token);
	if (claims?.token_use !== 'access') return null;

	const user = await deps.store.getUserByEmail(claims.sub, signal);
	return user ? { user, claims } : null;
}

export async function authorizeRequest(
	deps: AuthorizeRequestDeps,
	request: AuthorizationRequest,
): Promise<AuthorizationDecision> {
	const { store, permissionCache, logger } = deps;
	const path = pathOf(request.url);
	const method = request.method.toUpperCase();

	if (matchesPrefix(path, PUBLIC_PREFIXES)) {
		return { outcome: 'allow', principal: null };
	}

	try {
		const principal = await extractPrincipal(deps, request.authorization, request.signal);
		if (!principal) return NOT_AUTHENTICATED;

		if (matchesPrefix(path, AUTHENTICATED_PREFIXES)) {
			return { outcome: 'allow', principal };
		}

		const route = routeKey(path);

		const globalRoles = await store.listGlobalRolesOfUser(principal.user.id, request.signal);
		if (globalRoles.some((role) => role.name === SUPER_ADMIN)) {
			if (isAllowed(permissionCache.resolve(SUPER_ADMIN, SUPER_ADMIN), route, method)) {
				return { outcome: 'allow', principal, scope: SUPER_ADMIN, role: SUPER_ADMIN };
			}
		}

		const target = classifyScope(path);
		if (!target) {
			logger.debug({ path, user: principal.user.id }, 'No organization or team in path');
			return INSUFFICIENT_SCOPE;
		}

		const role: Role | null =
			target.scope === 'organization'
				? await store.getRoleOfUserInOrganization(principal.user.id, target.contextId, request.signal)
				: await store.getRoleOfUserInTeam(principal.user.id, target.contextId, request.signal);
		if (!role) {
			return {
				outcome: 'deny',
				status: 403,
				code: 'NOT_A_MEMBER',
				message: `User not part of the ${target.scope}`,
			};
		}

		const permissions = permissionCache.resolve(role.name, target.scope);
		if (!isAllowed(permissions, route, method)) {
			logger.debug({ route, method, role: role.name, scope: target.scope }, 'Permission denied');
			return PERMISSION_DENIED;
		}

		return { outcome: 'allow', principal, scope: target.scope, contextId: target.contextId, role: role.name };
	} catch (error) {
		logger.error({ err: error, method, path }, 'Authorization failed unexpectedly');
		return INTERNAL_ERROR;
	}
}
