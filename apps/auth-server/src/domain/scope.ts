/**
 * Scopes and HTTP methods
 *
 * A role or permission applies at exactly one scope. The permission cache
 * additionally keeps the global super-admin entry under its own key.
 */

export const SCOPES = ['organization', 'team'] as const;

export type Scope = (typeof SCOPES)[number];

/** Role name that grants every route, and the cache key of the global entry. */
export const SUPER_ADMIN = 'super_admin';

export type CacheScope = Scope | typeof SUPER_ADMIN;

export const CACHE_SCOPES: readonly CacheScope[] = [...SCOPES, SUPER_ADMIN];

/** Canonical order; method lists are always emitted in this order. */
export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

/** Route key that matches any route. */
export const WILDCARD_ROUTE = '*';

export function isHttpMethod(value: string): value is HttpMethod {
	return HTTP_METHODS.some((method) => method === value);
}

/**
 * Sort and de-duplicate methods into canonical order.
 */
export function canonicalMethods(methods: Iterable<HttpMethod>): HttpMethod[] {
	const present = new Set(methods);
	return HTTP_METHODS.filter((method) => present.has(method));
}
