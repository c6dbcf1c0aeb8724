/**
 * Role
 *
 * A named bundle of permissions applied at one scope. A role may inherit
 * every grant of one parent role of the same scope.
 */

import type { Scope } from './scope.js';

export interface Role {
	readonly id: number;
	readonly name: string;
	readonly slug: string;
	readonly description: string | null;
	readonly scope: Scope;
	readonly inheritsRoleId: number | null;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export interface NewRole {
	readonly name: string;
	readonly slug: string;
	readonly description: string | null;
	readonly scope: Scope;
	readonly inheritsRoleId: number | null;
}

/** Fields an update may change. Scope is fixed at creation. */
export type RolePatch = Partial<Pick<NewRole, 'name' | 'slug' | 'description' | 'inheritsRoleId'>>;

/** Identity fields embedded in tokens and membership responses. */
export interface RoleSummary {
	readonly id: number;
	readonly name: string;
	readonly slug: string;
}

export function toRoleSummary(role: Role): RoleSummary {
	return { id: role.id, name: role.name, slug: role.slug };
}
