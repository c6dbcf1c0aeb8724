/**
 * Permission
 *
 * The name follows the permission grammar in `permission-name.ts`; it is
 * validated on every write so the cache never meets an unparseable name.
 */

import type { Scope } from './scope.js';

export interface Permission {
	readonly id: number;
	readonly name: string;
	readonly slug: string;
	readonly description: string | null;
	readonly scope: Scope;
	readonly createdAt: Date;
	readonly updatedAt: Date;
}

export interface NewPermission {
	readonly name: string;
	readonly slug: string;
	readonly description: string | null;
	readonly scope: Scope;
}

export type PermissionPatch = Partial<NewPermission>;

/**
 * One row of the role/permission join the permission cache is built from.
 * `permissionName` is null for a role with no direct permissions.
 */
export interface RolePermissionGrant {
	readonly roleName: string;
	readonly roleScope: Scope;
	readonly inheritsRoleName: string | null;
	readonly permissionName: string | null;
}

export type PermissionDeleteOutcome = 'deleted' | 'not_found' | 'in_use';
