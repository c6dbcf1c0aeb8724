/**
 * Membership Repository
 *
 * Organization and team membership, and the role each membership carries.
 */

import { and, asc, eq, inArray } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { runStoreOperation, type TransactionManager } from '@tenantgate/persistence';

import { organizationUsers, organizations, roles, teamMembers, teams } from '../schema/index.js';
import type { OrganizationSummary, Role, MembershipAssignmentOutcome, TeamSummary } from '../../../domain/index.js';
import type { MembershipStore } from '../rbac-store.js';
import { recordToRole } from './role-repository.js';

/**
 * Create a Membership repository.
 */
export function createMembershipRepository(db: PostgresJsDatabase, transactions: TransactionManager): MembershipStore {
	return {
		getRoleOfUserInOrganization(userId: number, organizationId: number, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('memberships.getOrganizationRole', signal, async () => {
				const [record] = await db
					.select({ role: roles })
					.from(organizationUsers)
					.innerJoin(roles, eq(roles.id, organizationUsers.roleId))
					.where(and(eq(organizationUsers.userId, userId), eq(organizationUsers.organizationId, organizationId)))
					.limit(1);
				return record ? recordToRole(record.role) : null;
			});
		},

		getRoleOfUserInTeam(userId: number, teamId: number, signal?: AbortSignal): Promise<Role | null> {
			return runStoreOperation('memberships.getTeamRole', signal, async () => {
				const [record] = await db
					.select({ role: roles })
					.from(teamMembers)
					.innerJoin(roles, eq(roles.id, teamMembers.roleId))
					.where(and(eq(teamMembers.userId, userId), eq(teamMembers.teamId, teamId)))
					.limit(1);
				return record ? recordToRole(record.role) : null;
			});
		},

		assignUserToOrganization(
			organizationId: number,
			userId: number,
			roleId: number,
			signal?: AbortSignal,
		): Promise<MembershipAssignmentOutcome> {
			return runStoreOperation('memberships.assignOrganization', signal, () =>
				transactions.inTransaction(async (tx): Promise<MembershipAssignmentOutcome> => {
					const membership = and(eq(organizationUsers.organizationId, organizationId), eq(organizationUsers.userId, userId));
					const updated = await tx.db
						.update(organizationUsers)
						.set({ roleId })
						.where(membership)
						.returning({ userId: organizationUsers.userId });
					if (updated.length > 0) return 'updated';

					await tx.db.insert(organizationUsers).values({ organizationId, userId, roleId });
					return 'created';
				}),
			);
		},

		assignUserToTeam(teamId: number, userId: number, roleId: number, signal?: AbortSignal): Promise<MembershipAssignmentOutcome> {
			return runStoreOperation('memberships.assignTeam', signal, () =>
				transactions.inTransaction(async (tx): Promise<MembershipAssignmentOutcome> => {
					const updated = await tx.db
						.update(teamMembers)
						.set({ roleId })
						.where(and(eq(teamMembers.teamId, teamId), eq(teamMembers.userId, userId)))
						.returning({ userId: teamMembers.userId });
					if (updated.length > 0) return 'updated';

					await tx.db.insert(teamMembers).values({ teamId, userId, roleId });
					return 'created';
				}),
			);
		},

		removeUserFromOrganization(organizationId: number, userId: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('memberships.removeOrganization', signal, () =>
				transactions.inTransaction(async (tx) => {
					const deleted = await tx.db
						.delete(organizationUsers)
						.where(and(eq(organizationUsers.organizationId, organizationId), eq(organizationUsers.userId, userId)))
						.returning({ userId: organizationUsers.userId });
					if (deleted.length === 0) return false;

					const organizationTeams = tx.db
						.select({ id: teams.id })
						.from(teams)
						.where(eq(teams.organizationId, organizationId));
					await tx.db
						.delete(teamMembers)
						.where(and(eq(teamMembers.userId, userId), inArray(teamMembers.teamId, organizationTeams)));
					return true;
				}),
			);
		},

		removeUserFromTeam(teamId: number, userId: number, signal?: AbortSignal): Promise<boolean> {
			return runStoreOperation('memberships.removeTeam', signal, async () => {
				const deleted = await db
					.delete(teamMembers)
					.where(and(eq(teamMembers.teamId, teamId), eq(teamMembers.userId, userId)))
					.returning({ userId: teamMembers.userId });
				return deleted.length > 0;
			});
		},

		listOrganizationsOfUser(userId: number, signal?: AbortSignal): Promise<OrganizationSummary[]> {
			return runStoreOperation('memberships.listOrganizations', signal, () =>
				db
					.select({ id: organizations.id, name: organizations.name })
					.from(organizationUsers)
					.innerJoin(organizations, eq(organizations.id, organizationUsers.organizationId))
					.where(eq(organizationUsers.userId, userId))
					.orderBy(asc(organizations.id)),
			);
		},

		listTeamsOfUser(userId: number, organizationId?: number, signal?: AbortSignal): Promise<TeamSummary[]> {
			return runStoreOperation('memberships.listTeams', signal, () =>
				db
					.select({ id: teams.id, name: teams.name, organizationId: teams.organizationId })
					.from(teamMembers)
					.innerJoin(teams, eq(teams.id, teamMembers.teamId))
					.where(
						and(
							eq(teamMembers.userId, userId),
							organizationId === undefined ? undefined : eq(teams.organizationId, organizationId),
						),
					)
					.orderBy(asc(teams.id)),
			);
		},
	};
}
