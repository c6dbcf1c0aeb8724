/**
 * Remove User From Team Use Case
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { DirectoryStore, MembershipStore } from '../../../infrastructure/persistence/index.js';

import type { RemoveUserFromTeamCommand } from './command.js';

export interface TeamRemoval {
	readonly teamId: number;
	readonly userId: number;
}

export interface RemoveUserFromTeamUseCaseDeps {
	readonly store: Pick<DirectoryStore & MembershipStore, 'getUserByEmail' | 'removeUserFromTeam'>;
}

export function createRemoveUserFromTeamUseCase(
	deps: RemoveUserFromTeamUseCaseDeps,
): UseCase<RemoveUserFromTeamCommand, TeamRemoval> {
	const { store } = deps;

	return {
		async execute(command: RemoveUserFromTeamCommand, context: ExecutionContext): Promise<Result<TeamRemoval>> {
			const { signal } = context;
			const { teamId, userEmail } = command;

			const user = await store.getUserByEmail(userEmail, signal);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userEmail }));
			}

			if (!(await store.removeUserFromTeam(teamId, user.id, signal))) {
				return Result.failure(
					UseCaseError.notFound('MEMBERSHIP_NOT_FOUND', 'User is not part of the team', { teamId, userEmail }),
				);
			}

			return Result.success({ teamId, userId: user.id });
		},
	};
}
