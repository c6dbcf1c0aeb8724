/**
 * RBAC Store
 *
 * Typed access to roles, permissions, memberships, the user directory and
 * refresh tokens. Every operation accepts a cancellation signal; once it
 * aborts the call rejects with `DeadlineExceededError`. RBAC writes are issued
 * without one, since an abandoned statement can still commit. Mutations run
 * in their own transaction and surface driver failures as `DatabaseError`.
 *
 * Consumers depend on the narrowest slice they need (`RoleStore`,
 * `MembershipStore`, ...), so tests can hand them a partial fake.
 */

import type {
	NewPermission,
	NewRefreshToken,
	NewRole,
	NewTeam,
	NewUser,
	Organization,
	OrganizationSummary,
	Permission,
	PermissionDeleteOutcome,
	PermissionPatch,
	RefreshTokenRecord,
	Role,
	RolePatch,
	RolePermissionGrant,
	Scope,
	Team,
	MembershipAssignmentOutcome,
	TeamSummary,
	User,
} from '../../domain/index.js';

export interface RoleStore {
	createRole(role: NewRole, signal?: AbortSignal): Promise<Role>;
	getRoleById(id: number, signal?: AbortSignal): Promise<Role | null>;
	getRoleByName(name: string, signal?: AbortSignal): Promise<Role | null>;
	getRoleBySlug(slug: string, signal?: AbortSignal): Promise<Role | null>;
	listRoles(scope?: Scope, signal?: AbortSignal): Promise<Role[]>;
	updateRole(id: number, patch: RolePatch, signal?: AbortSignal): Promise<Role | null>;
	deleteRole(id: number, signal?: AbortSignal): Promise<boolean>;
	/** True while any membership, global assignment or child role references it. */
	isRoleInUse(id: number, signal?: AbortSignal): Promise<boolean>;
	listGlobalRolesOfUser(userId: number, signal?: AbortSignal): Promise<Role[]>;
	/** Returns false when the user already holds the role. */
	assignGlobalRole(userId: number, roleId: number, signal?: AbortSignal): Promise<boolean>;
}

export interface PermissionStore {
	createPermission(permission: NewPermission, signal?: AbortSignal): Promise<Permission>;
	getPermissionById(id: number, signal?: AbortSignal): Promise<Permission | null>;
	getPermissionByName(name: string, signal?: AbortSignal): Promise<Permission | null>;
	getPermissionBySlug(slug: string, signal?: AbortSignal): Promise<Permission | null>;
	listPermissions(signal?: AbortSignal): Promise<Permission[]>;
	updatePermission(id: number, patch: PermissionPatch, signal?: AbortSignal): Promise<Permission | null>;
	/** Checks usage and deletes in one transaction. */
	deletePermission(id: number, signal?: AbortSignal): Promise<PermissionDeleteOutcome>;
	isPermissionInUse(id: number, signal?: AbortSignal): Promise<boolean>;
	/** Returns false when the pair already exists; never writes a duplicate row. */
	assignPermissionToRole(roleId: number, permissionId: number, signal?: AbortSignal): Promise<boolean>;
	removePermissionFromRole(roleId: number, permissionId: number, signal?: AbortSignal): Promise<boolean>;
	listRolePermissions(roleId: number, signal?: AbortSignal): Promise<Permission[]>;
	/** Every role with each of its direct permissions; the permission cache source. */
	listRolePermissionGrants(signal?: AbortSignal): Promise<RolePermissionGrant[]>;
}

export interface MembershipStore {
	getRoleOfUserInOrganization(userId: number, organizationId: number, signal?: AbortSignal): Promise<Role | null>;
	getRoleOfUserInTeam(userId: number, teamId: number, signal?: AbortSignal): Promise<Role | null>;
	/** Inserts or replaces the user's organization role. */
	assignUserToOrganization(
		organizationId: number,
		userId: number,
		roleId: number,
		signal?: AbortSignal,
	): Promise<MembershipAssignmentOutcome>;
	/** Inserts or replaces the user's team role. */
	assignUserToTeam(teamId: number, userId: number, roleId: number, signal?: AbortSignal): Promise<MembershipAssignmentOutcome>;
	/**
	 * Deletes the organization membership and the user's memberships of the
	 * organization's teams. Returns false when the user was not a member.
	 */
	removeUserFromOrganization(organizationId: number, userId: number, signal?: AbortSignal): Promise<boolean>;
	removeUserFromTeam(teamId: number, userId: number, signal?: AbortSignal): Promise<boolean>;
	listOrganizationsOfUser(userId: number, signal?: AbortSignal): Promise<OrganizationSummary[]>;
	/** Teams the user belongs to, optionally limited to one organization. */
	listTeamsOfUser(userId: number, organizationId?: number, signal?: AbortSignal): Promise<TeamSummary[]>;
}

export interface DirectoryStore {
	getUserById(id: number, signal?: AbortSignal): Promise<User | null>;
	getUserByEmail(email: string, signal?: AbortSignal): Promise<User | null>;
	createUser(user: NewUser, signal?: AbortSignal): Promise<User>;
	getOrganizationById(id: number, signal?: AbortSignal): Promise<Organization | null>;
	createOrganization(name: string, signal?: AbortSignal): Promise<Organization>;
	getTeamById(id: number, signal?: AbortSignal): Promise<Team | null>;
	createTeam(team: NewTeam, signal?: AbortSignal): Promise<Team>;
	listTeamsOfOrganization(organizationId: number, signal?: AbortSignal): Promise<Team[]>;
}

export interface RefreshTokenStore {
	saveRefreshToken(token: NewRefreshToken, signal?: AbortSignal): Promise<RefreshTokenRecord>;
	findRefreshToken(token: string, signal?: AbortSignal): Promise<RefreshTokenRecord | null>;
	/** Returns false when no row matched. */
	revokeRefreshToken(token: string, signal?: AbortSignal): Promise<boolean>;
}

export type RbacStore = RoleStore & PermissionStore & MembershipStore & DirectoryStore & RefreshTokenStore;
