/**
 * Request path helpers for the authorization pipeline.
 */

import type { Scope } from '../domain/index.js';

export interface RouteScope {
	readonly scope: Scope;
	readonly contextId: number;
}

/** Paths reachable without a principal. */
export const PUBLIC_PREFIXES: readonly string[] = ['/auth', '/docs', '/health'];

/** Paths that need a principal but no organization or team scope. */
export const AUTHENTICATED_PREFIXES: readonly string[] = ['/rbac/context'];

const TEAM_PATH = /^\/rbac\/teams\/(\d+)(?:\/|$)/;
const ORGANIZATION_PATH = /\/organizations\/(\d+)(?:\/|$)/;
const NUMERIC = /^\d+$/;

/**
 * Strip the query string and any trailing slash.
 */
export function pathOf(url: string): string {
	const path = url.split('?', 1)[0] ?? '';
	return path.length > 1 && path.endsWith('/') ? path.replace(/\/+$/, '') : path;
}

/**
 * Exact match, or the prefix followed by `/`.
 */
export function matchesPrefix(path: string, prefixes: readonly string[]): boolean {
	return prefixes.some((prefix) => path === prefix || path.startsWith(`${prefix}/`));
}

/**
 * Team scope for `/rbac/teams/{id}...`, organization scope for any path with
 * `/organizations/{id}`, otherwise null.
 */
export function classifyScope(path: string): RouteScope | null {
	const team = TEAM_PATH.exec(path);
	if (team?.[1]) {
		return { scope: 'team', contextId: Number(team[1]) };
	}
	const organization = ORGANIZATION_PATH.exec(path);
	if (organization?.[1]) {
		return { scope: 'organization', contextId: Number(organization[1]) };
	}
	return null;
}

/**
 * The route key permissions are granted on: numeric segments dropped, and an
 * `organizations/{id}` prefix in front of a nested `teams` resource removed.
 *
 * ```
 * /rbac/organizations/5/teams/create  ->  /rbac/teams/create
 * /rbac/teams/9/assign-user           ->  /rbac/teams/assign-user
 * /rbac/organizations/5/assign-user   ->  /rbac/organizations/assign-user
 * ```
 */
export function routeKey(path: string): string {
	const segments = pathOf(path).split('/').filter((segment) => segment !== '');
	const kept: string[] = [];

	for (const [index, segment] of segments.entries()) {
		if (NUMERIC.test(segment)) continue;
		const next = segments[index + 1];
		const afterId = segments[index + 2];
		if (segment === 'organizations' && next !== undefined && NUMERIC.test(next) && afterId === 'teams') {
			continue;
		}
		kept.push(segment);
	}

	return `/${kept.join('/')}`;
}
