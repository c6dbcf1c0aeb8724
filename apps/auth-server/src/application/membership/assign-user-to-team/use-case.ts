/**
 * Assign User To Team Use Case
 *
 * Adds the user to the team, or replaces their team role when they already
 * belong to it.
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { MembershipAssignmentOutcome } from '../../../domain/index.js';
import type { DirectoryStore, MembershipStore, RoleStore } from '../../../infrastructure/persistence/index.js';
import { findRoleForScope } from '../role-scope.js';

import type { AssignUserToTeamCommand } from './command.js';

export interface TeamAssignment {
	readonly teamId: number;
	readonly userId: number;
	readonly roleId: number;
	readonly outcome: MembershipAssignmentOutcome;
}

export interface AssignUserToTeamUseCaseDeps {
	readonly store: Pick<
		DirectoryStore & MembershipStore & RoleStore,
		'getTeamById' | 'getUserByEmail' | 'getRoleById' | 'assignUserToTeam'
	>;
}

export function createAssignUserToTeamUseCase(
	deps: AssignUserToTeamUseCaseDeps,
): UseCase<AssignUserToTeamCommand, TeamAssignment> {
	const { store } = deps;

	return {
		async execute(command: AssignUserToTeamCommand, context: ExecutionContext): Promise<Result<TeamAssignment>> {
			const { signal } = context;
			const { teamId, roleId } = command;

			const team = await store.getTeamById(teamId, signal);
			if (!team) {
				return Result.failure(UseCaseError.notFound('TEAM_NOT_FOUND', 'Team not found', { teamId }));
			}

			const user = await store.getUserByEmail(command.userEmail, signal);
			if (!user) {
				return Result.failure(
					UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userEmail: command.userEmail }),
				);
			}

			const roleResult = await findRoleForScope(store, roleId, 'team', signal);
			if (Result.isFailure(roleResult)) {
				return roleResult;
			}

			const outcome = await store.assignUserToTeam(teamId, user.id, roleId, signal);
			return Result.success({ teamId, userId: user.id, roleId, outcome });
		},
	};
}
