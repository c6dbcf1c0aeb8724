/**
 * API Layer
 *
 * Route modules of the auth server, registered together.
 */

import type { FastifyInstance } from 'fastify';

import { registerAuthRoutes, type AuthRoutesDeps } from './auth.js';
import { registerContextRoutes, type ContextRoutesDeps } from './context.js';
import { registerHealthRoutes, type HealthRoutesDeps } from './health.js';
import { registerOrganizationsRoutes, type OrganizationsRoutesDeps } from './organizations.js';
import { registerPermissionsRoutes, type PermissionsRoutesDeps } from './permissions.js';
import { registerRolesRoutes, type RolesRoutesDeps } from './roles.js';
import { registerTeamsRoutes, type TeamsRoutesDeps } from './teams.js';

export { registerAuthRoutes, type AuthRoutesDeps } from './auth.js';
export { registerContextRoutes, type ContextRoutesDeps } from './context.js';
export { registerHealthRoutes, type HealthRoutesDeps } from './health.js';
export { registerOrganizationsRoutes, type OrganizationsRoutesDeps } from './organizations.js';
export { registerPermissionsRoutes, type PermissionsRoutesDeps } from './permissions.js';
export { registerRolesRoutes, type RolesRoutesDeps } from './roles.js';
export { registerTeamsRoutes, type TeamsRoutesDeps } from './teams.js';
export * from './responses.js';

/**
 * Dependencies of every route module. `store` is the union of what each
 * module reads directly.
 */
export type ApiRoutesDeps = AuthRoutesDeps &
	ContextRoutesDeps &
	HealthRoutesDeps &
	OrganizationsRoutesDeps &
	Omit<PermissionsRoutesDeps, 'store'> &
	Omit<RolesRoutesDeps, 'store'> &
	Omit<TeamsRoutesDeps, 'store'> & {
		readonly store: PermissionsRoutesDeps['store'] & RolesRoutesDeps['store'] & TeamsRoutesDeps['store'];
		readonly permissionCache: PermissionsRoutesDeps['permissionCache'] & HealthRoutesDeps['permissionCache'];
	};

export async function registerApiRoutes(fastify: FastifyInstance, deps: ApiRoutesDeps): Promise<void> {
	await registerHealthRoutes(fastify, deps);
	await registerAuthRoutes(fastify, deps);
	await registerContextRoutes(fastify, deps);
	await registerRolesRoutes(fastify, deps);
	await registerPermissionsRoutes(fastify, deps);
	await registerTeamsRoutes(fastify, deps);
	await registerOrganizationsRoutes(fastify, deps);
}
