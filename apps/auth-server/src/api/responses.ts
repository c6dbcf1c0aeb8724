/**
 * Response shapes shared by the route modules.
 */

import type { Permission, Role, Team } from '../domain/index.js';

export interface RoleResponse {
	id: number;
	name: string;
	slug: string;
	description: string | null;
	scope: string;
	inheritsRoleId: number | null;
	createdAt: string;
	updatedAt: string;
}

export interface PermissionResponse {
	id: number;
	name: string;
	slug: string;
	description: string | null;
	scope: string;
	createdAt: string;
	updatedAt: string;
}

export interface TeamResponse {
	id: number;
	organizationId: number;
	name: string;
	description: string | null;
	createdAt: string;
}

export function toRoleResponse(role: Role): RoleResponse {
	return {
		id: role.id,
		name: role.name,
		slug: role.slug,
		description: role.description,
		scope: role.scope,
		inheritsRoleId: role.inheritsRoleId,
		createdAt: role.createdAt.toISOString(),
		updatedAt: role.updatedAt.toISOString(),
	};
}

export function toPermissionResponse(permission: Permission): PermissionResponse {
	return {
		id: permission.id,
		name: permission.name,
		slug: permission.slug,
		description: permission.description,
		scope: permission.scope,
		createdAt: permission.createdAt.toISOString(),
		updatedAt: permission.updatedAt.toISOString(),
	};
}

export function toTeamResponse(team: Team): TeamResponse {
	return {
		id: team.id,
		organizationId: team.organizationId,
		name: team.name,
		description: team.description,
		createdAt: team.createdAt.toISOString(),
	};
}
