/**
 * In-process RbacStore for tests. Mirrors the database constraints the
 * Drizzle repositories rely on: unique names/slugs/tokens and composite keys.
 */

import { DeadlineExceededError } from '@tenantgate/domain-core';
import { DatabaseError } from '@tenantgate/persistence';
import type {
	NewPermission,
	NewRefreshToken,
	NewRole,
	NewTeam,
	NewUser,
	Organization,
	OrganizationMembership,
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
	TeamMembership,
	TeamSummary,
	User,
} from '../../domain/index.js';
import type { RbacStore } from '../../infrastructure/persistence/index.js';

function uniqueViolation(operation: string): DatabaseError {
	return new DatabaseError(operation, Object.assign(new Error('duplicate key'), { code: '23505' }));
}

export interface InMemoryRbacStore extends RbacStore {
	readonly data: {
		roles: Role[];
		permissions: Permission[];
		rolePermissions: Array<{ roleId: number; permissionId: number }>;
		userRoles: Array<{ userId: number; roleId: number }>;
		organizationUsers: OrganizationMembership[];
		teamMembers: TeamMembership[];
		users: User[];
		organizations: Organization[];
		teams: Team[];
		refreshTokens: RefreshTokenRecord[];
	};
	/** Make every subsequent call reject with a DatabaseError until cleared. */
	failWith(error: Error | null): void;
}

export function createInMemoryRbacStore(now: () => Date = () => new Date()): InMemoryRbacStore {
	const data: InMemoryRbacStore['data'] = {
		roles: [],
		permissions: [],
		rolePermissions: [],
		userRoles: [],
		organizationUsers: [],
		teamMembers: [],
		users: [],
		organizations: [],
		teams: [],
		refreshTokens: [],
	};
	let nextId = 1000;
	let failure: Error | null = null;

	async function run<T>(operation: string, signal: AbortSignal | undefined, fn: () => T): Promise<T> {
		if (signal?.aborted) throw new DeadlineExceededError();
		if (failure) throw new DatabaseError(operation, failure);
		return fn();
	}

	const roleById = (id: number): Role | null => data.roles.find((role) => role.id === id) ?? null;
	const permissionById = (id: number): Permission | null =>
		data.permissions.find((permission) => permission.id === id) ?? null;

	return {
		data,

		failWith(error) {
			failure = error;
		},

		createRole(role: NewRole, signal?: AbortSignal) {
			return run('roles.create', signal, () => {
				if (data.roles.some((r) => r.name === role.name || r.slug === role.slug)) {
					throw uniqueViolation('roles.create');
				}
				const created: Role = { ...role, id: nextId++, createdAt: now(), updatedAt: now() };
				data.roles.push(created);
				return created;
			});
		},

		getRoleById: (id, signal) => run('roles.getById', signal, () => roleById(id)),

		getRoleByName: (name, signal) =>
			run('roles.getByName', signal, () => data.roles.find((role) => role.name === name) ?? null),

		getRoleBySlug: (slug, signal) =>
			run('roles.getBySlug', signal, () => data.roles.find((role) => role.slug === slug) ?? null),

		listRoles: (scope?: Scope, signal?: AbortSignal) =>
			run('roles.list', signal, () => data.roles.filter((role) => scope === undefined || role.scope === scope)),

		updateRole(id: number, patch: RolePatch, signal?: AbortSignal) {
			return run('roles.update', signal, () => {
				const index = data.roles.findIndex((role) => role.id === id);
				const existing = data.roles[index];
				if (!existing) return null;
				const updated: Role = { ...existing, ...patch, updatedAt: now() };
				data.roles[index] = updated;
				return updated;
			});
		},

		deleteRole(id, signal) {
			return run('roles.delete', signal, () => {
				const before = data.roles.length;
				data.roles = data.roles.filter((role) => role.id !== id);
				data.rolePermissions = data.rolePermissions.filter((grant) => grant.roleId !== id);
				return data.roles.length < before;
			});
		},

		isRoleInUse: (id, signal) =>
			run(
				'roles.isInUse',
				signal,
				() =>
					data.userRoles.some((row) => row.roleId === id) ||
					data.organizationUsers.some((row) => row.roleId === id) ||
					data.teamMembers.some((row) => row.roleId === id) ||
					data.roles.some((role) => role.inheritsRoleId === id),
			),

		listGlobalRolesOfUser: (userId, signal) =>
			run('roles.listGlobalOfUser', signal, () =>
				data.userRoles
					.filter((row) => row.userId === userId)
					.map((row) => roleById(row.roleId))
					.filter((role): role is Role => role !== null),
			),

		assignGlobalRole(userId, roleId, signal) {
			return run('roles.assignGlobal', signal, () => {
				if (data.userRoles.some((row) => row.userId === userId && row.roleId === roleId)) return false;
				data.userRoles.push({ userId, roleId });
				return true;
			});
		},

		createPermission(permission: NewPermission, signal?: AbortSignal) {
			return run('permissions.create', signal, () => {
				if (data.permissions.some((p) => p.name === permission.name || p.slug === permission.slug)) {
					throw uniqueViolation('permissions.create');
				}
				const created: Permission = { ...permission, id: nextId++, createdAt: now(), updatedAt: now() };
				data.permissions.push(created);
				return created;
			});
		},

		getPermissionById: (id, signal) => run('permissions.getById', signal, () => permissionById(id)),

		getPermissionByName: (name, signal) =>
			run('permissions.getByName', signal, () => data.permissions.find((p) => p.name === name) ?? null),

		getPermissionBySlug: (slug, signal) =>
			run('permissions.getBySlug', signal, () => data.permissions.find((p) => p.slug === slug) ?? null),

		listPermissions: (signal) => run('permissions.list', signal, () => [...data.permissions]),

		updatePermission(id: number, patch: PermissionPatch, signal?: AbortSignal) {
			return run('permissions.update', signal, () => {
				const index = data.permissions.findIndex((p) => p.id === id);
				const existing = data.permissions[index];
				if (!existing) return null;
				const updated: Permission = { ...existing, ...patch, updatedAt: now() };
				data.permissions[index] = updated;
				return updated;
			});
		},

		deletePermission(id, signal) {
			return run('permissions.delete', signal, (): PermissionDeleteOutcome => {
				if (!permissionById(id)) return 'not_found';
				if (data.rolePermissions.some((grant) => grant.permissionId === id)) return 'in_use';
				data.permissions = data.permissions.filter((p) => p.id !== id);
				return 'deleted';
			});
		},

		isPermissionInUse: (id, signal) =>
			run('permissions.isInUse', signal, () => data.rolePermissions.some((grant) => grant.permissionId === id)),

		assignPermissionToRole(roleId, permissionId, signal) {
			return run('rolePermissions.assign', signal, () => {
				if (data.rolePermissions.some((g) => g.roleId === roleId && g.permissionId === permissionId)) return false;
				data.rolePermissions.push({ roleId, permissionId });
				return true;
			});
		},

		removePermissionFromRole(roleId, permissionId, signal) {
			return run('rolePermissions.remove', signal, () => {
				const before = data.rolePermissions.length;
				data.rolePermissions = data.rolePermissions.filter(
					(g) => !(g.roleId === roleId && g.permissionId === permissionId),
				);
				return data.rolePermissions.length < before;
			});
		},

		listRolePermissions: (roleId, signal) =>
			run('rolePermissions.listOfRole', signal, () =>
				data.rolePermissions
					.filter((grant) => grant.roleId === roleId)
					.map((grant) => permissionById(grant.permissionId))
					.filter((permission): permission is Permission => permission !== null),
			),

		listRolePermissionGrants: (signal) =>
			run('rolePermissions.listGrants', signal, () =>
				data.roles.flatMap((role): RolePermissionGrant[] => {
					const parent = role.inheritsRoleId === null ? null : roleById(role.inheritsRoleId);
					const base = { roleName: role.name, roleScope: role.scope, inheritsRoleName: parent?.name ?? null };
					const names = data.rolePermissions
						.filter((grant) => grant.roleId === role.id)
						.map((grant) => permissionById(grant.permissionId)?.name)
						.filter((name): name is string => name !== undefined);
					if (names.length === 0) return [{ ...base, permissionName: null }];
					return names.map((permissionName) => ({ ...base, permissionName }));
				}),
			),

		getRoleOfUserInOrganization: (userId, organizationId, signal) =>
			run('memberships.getOrganizationRole', signal, () => {
				const row = data.organizationUsers.find((m) => m.userId === userId && m.organizationId === organizationId);
				return row ? roleById(row.roleId) : null;
			}),

		getRoleOfUserInTeam: (userId, teamId, signal) =>
			run('memberships.getTeamRole', signal, () => {
				const row = data.teamMembers.find((m) => m.userId === userId && m.teamId === teamId);
				return row ? roleById(row.roleId) : null;
			}),

		assignUserToOrganization(organizationId, userId, roleId, signal) {
			return run('memberships.assignOrganization', signal, (): MembershipAssignmentOutcome => {
				const index = data.organizationUsers.findIndex((m) => m.userId === userId && m.organizationId === organizationId);
				if (index >= 0) {
					data.organizationUsers[index] = { organizationId, userId, roleId };
					return 'updated';
				}
				data.organizationUsers.push({ organizationId, userId, roleId });
				return 'created';
			});
		},

		assignUserToTeam(teamId, userId, roleId, signal) {
			return run('memberships.assignTeam', signal, (): MembershipAssignmentOutcome => {
				const index = data.teamMembers.findIndex((m) => m.userId === userId && m.teamId === teamId);
				if (index >= 0) {
					data.teamMembers[index] = { teamId, userId, roleId };
					return 'updated';
				}
				data.teamMembers.push({ teamId, userId, roleId });
				return 'created';
			});
		},

		removeUserFromOrganization(organizationId, userId, signal) {
			return run('memberships.removeOrganization', signal, () => {
				const before = data.organizationUsers.length;
				data.organizationUsers = data.organizationUsers.filter(
					(m) => !(m.organizationId === organizationId && m.userId === userId),
				);
				if (data.organizationUsers.length === before) return false;

				const organizationTeams = new Set(
					data.teams.filter((team) => team.organizationId === organizationId).map((team) => team.id),
				);
				data.teamMembers = data.teamMembers.filter((m) => !(m.userId === userId && organizationTeams.has(m.teamId)));
				return true;
			});
		},

		removeUserFromTeam(teamId, userId, signal) {
			return run('memberships.removeTeam', signal, () => {
				const before = data.teamMembers.length;
				data.teamMembers = data.teamMembers.filter((m) => !(m.teamId === teamId && m.userId === userId));
				return data.teamMembers.length < before;
			});
		},

		listOrganizationsOfUser: (userId, signal) =>
			run('memberships.listOrganizations', signal, () =>
				data.organizationUsers
					.filter((m) => m.userId === userId)
					.map((m) => data.organizations.find((org) => org.id === m.organizationId))
					.filter((org): org is Organization => org !== undefined)
					.map((org): OrganizationSummary => ({ id: org.id, name: org.name })),
			),

		listTeamsOfUser: (userId, organizationId, signal) =>
			run('memberships.listTeams', signal, () =>
				data.teamMembers
					.filter((m) => m.userId === userId)
					.map((m) => data.teams.find((team) => team.id === m.teamId))
					.filter((team): team is Team => team !== undefined)
					.filter((team) => organizationId === undefined || team.organizationId === organizationId)
					.map((team): TeamSummary => ({ id: team.id, name: team.name, organizationId: team.organizationId })),
			),

		getUserById: (id, signal) => run('users.getById', signal, () => data.users.find((u) => u.id === id) ?? null),

		getUserByEmail: (email, signal) =>
			run('users.getByEmail', signal, () => data.users.find((u) => u.email === email) ?? null),

		createUser(user: NewUser, signal?: AbortSignal) {
			return run('users.create', signal, () => {
				if (data.users.some((u) => u.email === user.email)) throw uniqueViolation('users.create');
				const created: User = {
					id: nextId++,
					email: user.email,
					firstName: user.firstName ?? null,
					lastName: user.lastName ?? null,
					phoneNumber: user.phoneNumber ?? null,
					verified: user.verified ?? false,
					passwordHash: user.passwordHash ?? null,
					createdAt: now(),
				};
				data.users.push(created);
				return created;
			});
		},

		getOrganizationById: (id, signal) =>
			run('organizations.getById', signal, () => data.organizations.find((org) => org.id === id) ?? null),

		createOrganization(name, signal) {
			return run('organizations.create', signal, () => {
				const created: Organization = { id: nextId++, name, createdAt: now() };
				data.organizations.push(created);
				return created;
			});
		},

		getTeamById: (id, signal) => run('teams.getById', signal, () => data.teams.find((team) => team.id === id) ?? null),

		createTeam(team: NewTeam, signal?: AbortSignal) {
			return run('teams.create', signal, () => {
				if (data.teams.some((t) => t.organizationId === team.organizationId && t.name === team.name)) {
					throw uniqueViolation('teams.create');
				}
				const created: Team = { ...team, id: nextId++, createdAt: now() };
				data.teams.push(created);
				return created;
			});
		},

		listTeamsOfOrganization: (organizationId, signal) =>
			run('teams.listOfOrganization', signal, () => data.teams.filter((team) => team.organizationId === organizationId)),

		saveRefreshToken(token: NewRefreshToken, signal?: AbortSignal) {
			return run('refreshTokens.save', signal, () => {
				if (data.refreshTokens.some((row) => row.token === token.token)) throw uniqueViolation('refreshTokens.save');
				const created: RefreshTokenRecord = { ...token, id: nextId++, revoked: false, createdAt: now() };
				data.refreshTokens.push(created);
				return created;
			});
		},

		findRefreshToken: (token, signal) =>
			run('refreshTokens.find', signal, () => data.refreshTokens.find((row) => row.token === token) ?? null),

		revokeRefreshToken(token, signal) {
			return run('refreshTokens.revoke', signal, () => {
				const index = data.refreshTokens.findIndex((row) => row.token === token);
				const existing = data.refreshTokens[index];
				if (!existing) return false;
				data.refreshTokens[index] = { ...existing, revoked: true };
				return true;
			});
		},
	};
}

/**
 * Insert rows with explicit ids, for scenarios that name them.
 */
export function seed(store: InMemoryRbacStore) {
	return {
		user(id: number, email: string, extra: Partial<Omit<User, 'id' | 'email'>> = {}): User {
			const user: User = {
				id,
				email,
				firstName: null,
				lastName: null,
				phoneNumber: null,
				verified: true,
				passwordHash: null,
				createdAt: new Date('2024-01-01T00:00:00.000Z'),
				...extra,
			};
			store.data.users.push(user);
			return user;
		},
		organization(id: number, name: string, createdAt = new Date('2024-01-01T00:00:00.000Z')): Organization {
			const organization: Organization = { id, name, createdAt };
			store.data.organizations.push(organization);
			return organization;
		},
		team(id: number, organizationId: number, name: string, description: string | null = null): Team {
			const team: Team = { id, organizationId, name, description, createdAt: new Date('2024-01-01T00:00:00.000Z') };
			store.data.teams.push(team);
			return team;
		},
		role(id: number, name: string, scope: Scope, inheritsRoleId: number | null = null): Role {
			const role: Role = {
				id,
				name,
				slug: name.toLowerCase().replace(/[^a-z0-9]+/g, '-'),
				description: null,
				scope,
				inheritsRoleId,
				createdAt: new Date('2024-01-01T00:00:00.000Z'),
				updatedAt: new Date('2024-01-01T00:00:00.000Z'),
			};
			store.data.roles.push(role);
			return role;
		},
		permission(id: number, name: string, scope: Scope): Permission {
			const permission: Permission = {
				id,
				name,
				slug: `perm-${id}`,
				description: null,
				scope,
				createdAt: new Date('2024-01-01T00:00:00.000Z'),
				updatedAt: new Date('2024-01-01T00:00:00.000Z'),
			};
			store.data.permissions.push(permission);
			return permission;
		},
		grant(roleId: number, permissionId: number): void {
			store.data.rolePermissions.push({ roleId, permissionId });
		},
		organizationMember(organizationId: number, userId: number, roleId: number): void {
			store.data.organizationUsers.push({ organizationId, userId, roleId });
		},
		teamMember(teamId: number, userId: number, roleId: number): void {
			store.data.teamMembers.push({ teamId, userId, roleId });
		},
		globalRole(userId: number, roleId: number): void {
			store.data.userRoles.push({ userId, roleId });
		},
	};
}
