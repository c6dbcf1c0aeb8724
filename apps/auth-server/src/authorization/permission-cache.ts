/**
 * Permission Cache
 *
 * Process-wide, read-mostly view of every role's direct grants, grouped by
 * scope. Rebuilt wholesale from the store and published by swapping a single
 * snapshot reference, so readers see either the old or the new table and
 * never a mix.
 *
 * @example
 * ```typescript
 * const cache = createPermissionCache({ store, logger });
 * await cache.refresh();
 * cache.resolve('Admin', 'organization');
 * // { '/rbac/teams/create': ['POST'], ... }
 * ```
 */

import type { Logger } from '@tenantgate/logging';
import {
	CACHE_SCOPES,
	HTTP_METHODS,
	SUPER_ADMIN,
	WILDCARD_ROUTE,
	canonicalMethods,
	tryParsePermissionName,
	type CacheScope,
	type HttpMethod,
} from '../domain/index.js';
import type { PermissionStore } from '../infrastructure/persistence/index.js';
import { FALLBACK_PERMISSIONS } from './fallback-permissions.js';
import { isAllowed, resolveEffectivePermissions, type EffectivePermissions } from './effective-permissions.js';

export type RoutePermissions = Readonly<Record<string, readonly HttpMethod[]>>;

/**
 * A role's direct grants and the name of the role it inherits from.
 */
export interface RoleEntry {
	readonly routes: RoutePermissions;
	readonly inherits: string | null;
}

export type CacheSource = 'empty' | 'database' | 'fallback';

export interface CacheSnapshot {
	readonly source: CacheSource;
	readonly builtAt: Date;
	readonly scopes: ReadonlyMap<CacheScope, ReadonlyMap<string, RoleEntry>>;
}

export interface PermissionCache {
	/** Read the store and produce a snapshot without publishing it. */
	build(signal?: AbortSignal): Promise<CacheSnapshot>;
	/**
	 * Build and publish. Returns false, keeping the previous snapshot, when
	 * the build fails.
	 */
	refresh(signal?: AbortSignal): Promise<boolean>;
	clear(): void;
	/** The role's direct entry; an empty entry when the role is unknown. */
	get(scope: CacheScope, roleName: string): RoleEntry;
	/** Effective permissions of the role, inheritance included. */
	resolve(roleName: string, scope: CacheScope): EffectivePermissions;
	canAccess(roleName: string, scope: CacheScope, route: string, method: string): boolean;
	roles(scope: CacheScope): string[];
	snapshot(): CacheSnapshot;
}

export interface PermissionCacheDeps {
	readonly store: Pick<PermissionStore, 'listRolePermissionGrants'>;
	readonly logger: Logger;
}

const EMPTY_ENTRY: RoleEntry = { routes: {}, inherits: null };

export function emptySnapshot(): CacheSnapshot {
	return { source: 'empty', builtAt: new Date(), scopes: new Map() };
}

export function fallbackSnapshot(): CacheSnapshot {
	const scopes = new Map<CacheScope, Map<string, RoleEntry>>();
	for (const [scope, roleName, entry] of FALLBACK_PERMISSIONS) {
		let roles = scopes.get(scope);
		if (!roles) {
			roles = new Map();
			scopes.set(scope, roles);
		}
		roles.set(roleName, entry);
	}
	return { source: 'fallback', builtAt: new Date(), scopes };
}

interface EntryBuilder {
	readonly routes: Map<string, Set<HttpMethod>>;
	readonly inherits: string | null;
}

function grant(builder: EntryBuilder, route: string, methods: readonly HttpMethod[]): void {
	let target = builder.routes.get(route);
	if (!target) {
		target = new Set();
		builder.routes.set(route, target);
	}
	for (const method of methods) target.add(method);
}

function freeze(builder: EntryBuilder): RoleEntry {
	const routes: Record<string, HttpMethod[]> = {};
	for (const [route, methods] of builder.routes) {
		routes[route] = canonicalMethods(methods);
	}
	return { routes, inherits: builder.inherits };
}

export function createPermissionCache(deps: PermissionCacheDeps): PermissionCache {
	const { store, logger } = deps;
	let current = emptySnapshot();
	let lastStarted = 0;
	let lastPublished = 0;

	async function build(signal?: AbortSignal): Promise<CacheSnapshot> {
		const grants = await store.listRolePermissionGrants(signal);

		if (!grants.some((row) => row.permissionName !== null)) {
			logger.warn('No role permissions stored, using built-in permission table');
			return fallbackSnapshot();
		}

		const builders = new Map<CacheScope, Map<string, EntryBuilder>>();
		const builderFor = (scope: CacheScope, roleName: string, inherits: string | null): EntryBuilder => {
			let roles = builders.get(scope);
			if (!roles) {
				roles = new Map();
				builders.set(scope, roles);
			}
			let builder = roles.get(roleName);
			if (!builder) {
				builder = { routes: new Map(), inherits };
				roles.set(roleName, builder);
			}
			return builder;
		};

		for (const row of grants) {
			const builder = builderFor(row.roleScope, row.roleName, row.inheritsRoleName);

			if (row.roleName === SUPER_ADMIN) {
				grant(builder, WILDCARD_ROUTE, HTTP_METHODS);
			}
			if (row.permissionName === null) continue;

			const parsed = tryParsePermissionName(row.permissionName);
			if (parsed instanceof Error) {
				logger.warn({ role: row.roleName, permission: row.permissionName }, 'Skipping unparseable permission');
				continue;
			}
			grant(builder, parsed.route, parsed.methods);
		}

		const scopes = new Map<CacheScope, Map<string, RoleEntry>>();
		for (const [scope, roles] of builders) {
			const entries = new Map<string, RoleEntry>();
			for (const [roleName, builder] of roles) {
				entries.set(roleName, freeze(builder));
			}
			scopes.set(scope, entries);
		}

		const superAdmin = scopes.get('organization')?.get(SUPER_ADMIN) ?? scopes.get('team')?.get(SUPER_ADMIN);
		if (superAdmin) {
			scopes.set(SUPER_ADMIN, new Map([[SUPER_ADMIN, superAdmin]]));
		}

		return { source: 'database', builtAt: new Date(), scopes };
	}

	return {
		build,

		async refresh(signal?: AbortSignal): Promise<boolean> {
			const generation = ++lastStarted;
			let next: CacheSnapshot;
			try {
				next = await build(signal);
			} catch (error) {
				logger.error({ err: error }, 'Permission cache rebuild failed, keeping previous snapshot');
				return false;
			}

			// A slower, older build must not replace a newer one
			if (generation > lastPublished) {
				current = next;
				lastPublished = generation;
				logger.info(
					{
						source: next.source,
						roles: Object.fromEntries(CACHE_SCOPES.map((scope) => [scope, next.scopes.get(scope)?.size ?? 0])),
					},
					'Permission cache refreshed',
				);
			}
			return true;
		},

		clear() {
			current = emptySnapshot();
		},

		get(scope: CacheScope, roleName: string): RoleEntry {
			return current.scopes.get(scope)?.get(roleName) ?? EMPTY_ENTRY;
		},

		resolve(roleName: string, scope: CacheScope): EffectivePermissions {
			return resolveEffectivePermissions(current, roleName, scope);
		},

		canAccess(roleName: string, scope: CacheScope, route: string, method: string): boolean {
			return isAllowed(resolveEffectivePermissions(current, roleName, scope), route, method.toUpperCase());
		},

		roles(scope: CacheScope): string[] {
			return [...(current.scopes.get(scope)?.keys() ?? [])];
		},

		snapshot(): CacheSnapshot {
			return current;
		},
	};
}
