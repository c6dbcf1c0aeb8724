/**
 * Permission name grammar
 *
 * A permission's name encodes the route and methods it grants:
 *
 * ```
 * name     := "super_admin" | resource ":" methods | resource ":" action ":" methods
 * resource := [a-z0-9_-]+
 * action   := [a-z0-9_-]+
 * methods  := method ("," method)*
 * method   := GET | POST | PUT | DELETE | PATCH
 * ```
 *
 * Segments and methods are case-insensitive. `resource:methods` grants
 * `/rbac/{resource}`, `resource:action:methods` grants `/rbac/{resource}/{action}`,
 * and `super_admin` grants the wildcard route with every method.
 */

import { HTTP_METHODS, SUPER_ADMIN, WILDCARD_ROUTE, canonicalMethods, isHttpMethod, type HttpMethod } from './scope.js';

export const ROUTE_PREFIX = '/rbac';

const SEGMENT = /^[a-z0-9_-]+$/;

export interface PermissionGrant {
	readonly route: string;
	readonly methods: readonly HttpMethod[];
}

export class InvalidPermissionNameError extends Error {
	readonly permissionName: string;
	readonly reason: string;

	constructor(permissionName: string, reason: string) {
		super(`Invalid permission name "${permissionName}": ${reason}`);
		this.name = 'InvalidPermissionNameError';
		this.permissionName = permissionName;
		this.reason = reason;
	}
}

function parseMethods(name: string, raw: string): HttpMethod[] {
	const methods: HttpMethod[] = [];
	for (const part of raw.split(',')) {
		const method = part.trim().toUpperCase();
		if (!isHttpMethod(method)) {
			throw new InvalidPermissionNameError(name, `unknown method "${part}"`);
		}
		methods.push(method);
	}
	return canonicalMethods(methods);
}

function parseSegment(name: string, raw: string, label: string): string {
	const segment = raw.toLowerCase();
	if (!SEGMENT.test(segment)) {
		throw new InvalidPermissionNameError(name, `${label} must match [a-z0-9_-]+`);
	}
	return segment;
}

/**
 * Parse a permission name into the route and methods it grants.
 *
 * @throws InvalidPermissionNameError when the name does not follow the grammar
 */
export function parsePermissionName(name: string): PermissionGrant {
	if (name === SUPER_ADMIN) {
		return { route: WILDCARD_ROUTE, methods: [...HTTP_METHODS] };
	}

	const parts = name.split(':');
	if (parts.length === 2) {
		const [resource = '', methods = ''] = parts;
		return {
			route: `${ROUTE_PREFIX}/${parseSegment(name, resource, 'resource')}`,
			methods: parseMethods(name, methods),
		};
	}
	if (parts.length === 3) {
		const [resource = '', action = '', methods = ''] = parts;
		return {
			route: `${ROUTE_PREFIX}/${parseSegment(name, resource, 'resource')}/${parseSegment(name, action, 'action')}`,
			methods: parseMethods(name, methods),
		};
	}

	throw new InvalidPermissionNameError(name, 'expected resource:methods or resource:action:methods');
}

/**
 * Non-throwing variant of {@link parsePermissionName}.
 */
export function tryParsePermissionName(name: string): PermissionGrant | InvalidPermissionNameError {
	try {
		return parsePermissionName(name);
	} catch (error) {
		if (error instanceof InvalidPermissionNameError) return error;
		throw error;
	}
}
