/**
 * Effective-permission resolution
 *
 * Walks a role's inheritance chain inside one cache snapshot and merges the
 * grants of every role on the way. Named routes and the wildcard are merged
 * separately; the wildcard is listed last.
 */

import { WILDCARD_ROUTE, canonicalMethods, type CacheScope, type HttpMethod } from '../domain/index.js';
import { InheritanceDepthExceededError } from './errors.js';
import type { CacheSnapshot, RoleEntry } from './permission-cache.js';

/** Route key to methods, methods in canonical order. */
export type EffectivePermissions = Record<string, HttpMethod[]>;

/** Roles visited before the walk is treated as a cycle. */
export const MAX_INHERITANCE_DEPTH = 16;

/**
 * @throws InheritanceDepthExceededError when more than {@link MAX_INHERITANCE_DEPTH} roles are chained
 */
export function resolveEffectivePermissions(
	snapshot: CacheSnapshot,
	roleName: string,
	scope: CacheScope,
): EffectivePermissions {
	const roles = snapshot.scopes.get(scope);
	const named = new Map<string, Set<HttpMethod>>();
	const wildcard = new Set<HttpMethod>();

	let visited = 0;
	let current: string | null = roleName;
	while (current !== null) {
		const entry: RoleEntry | undefined = roles?.get(current);
		if (!entry) break;

		visited++;
		if (visited > MAX_INHERITANCE_DEPTH) {
			throw new InheritanceDepthExceededError(roleName, scope, MAX_INHERITANCE_DEPTH);
		}

		for (const [route, methods] of Object.entries(entry.routes)) {
			let target = route === WILDCARD_ROUTE ? wildcard : named.get(route);
			if (!target) {
				target = new Set();
				named.set(route, target);
			}
			for (const method of methods) target.add(method);
		}
		current = entry.inherits;
	}

	const permissions: EffectivePermissions = {};
	for (const [route, methods] of named) {
		permissions[route] = canonicalMethods(methods);
	}
	if (wildcard.size > 0) {
		permissions[WILDCARD_ROUTE] = canonicalMethods(wildcard);
	}
	return permissions;
}

/**
 * Whether the permissions grant `method` on `route`, directly or through the wildcard.
 */
export function isAllowed(permissions: EffectivePermissions, route: string, method: string): boolean {
	const matches = (methods: readonly string[] | undefined): boolean => methods?.includes(method) ?? false;
	return matches(permissions[route]) || matches(permissions[WILDCARD_ROUTE]);
}
