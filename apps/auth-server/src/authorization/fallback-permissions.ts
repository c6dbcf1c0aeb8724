/**
 * Built-in permission table, used when the database holds no grants yet.
 */

import { HTTP_METHODS, SUPER_ADMIN, WILDCARD_ROUTE, type CacheScope } from '../domain/index.js';
import type { RoleEntry } from './permission-cache.js';

export const FALLBACK_PERMISSIONS: ReadonlyArray<readonly [CacheScope, string, RoleEntry]> = [
	[
		'organization',
		'Admin',
		{
			routes: {
				'/rbac/teams/create': ['POST'],
				'/rbac/teams/assign-user': ['POST'],
				'/rbac/teams/remove-user': ['DELETE'],
				'/rbac/teams': ['GET'],
			},
			inherits: null,
		},
	],
	['organization', 'Member', { routes: { '/rbac/teams': ['GET'] }, inherits: null }],
	[
		'team',
		'Lead',
		{
			routes: {
				'/rbac/teams/assign-user': ['POST'],
				'/rbac/teams/remove-user': ['DELETE'],
				'/rbac/teams': ['GET'],
			},
			inherits: null,
		},
	],
	['team', 'Team_Member', { routes: { '/rbac/teams': ['GET'] }, inherits: null }],
	[SUPER_ADMIN, SUPER_ADMIN, { routes: { [WILDCARD_ROUTE]: [...HTTP_METHODS] }, inherits: null }],
];
