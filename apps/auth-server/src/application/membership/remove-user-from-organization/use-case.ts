/**
 * Remove User From Organization Use Case
 *
 * The user also leaves every team of the organization.
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { DirectoryStore, MembershipStore } from '../../../infrastructure/persistence/index.js';

import type { RemoveUserFromOrganizationCommand } from './command.js';

export interface OrganizationRemoval {
	readonly organizationId: number;
	readonly userId: number;
}

export interface RemoveUserFromOrganizationUseCaseDeps {
	readonly store: Pick<DirectoryStore & MembershipStore, 'getUserByEmail' | 'removeUserFromOrganization'>;
}

export function createRemoveUserFromOrganizationUseCase(
	deps: RemoveUserFromOrganizationUseCaseDeps,
): UseCase<RemoveUserFromOrganizationCommand, OrganizationRemoval> {
	const { store } = deps;

	return {
		async execute(
			command: RemoveUserFromOrganizationCommand,
			context: ExecutionContext,
		): Promise<Result<OrganizationRemoval>> {
			const { signal } = context;
			const { organizationId, userEmail } = command;

			const user = await store.getUserByEmail(userEmail, signal);
			if (!user) {
				return Result.failure(UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userEmail }));
			}

			if (!(await store.removeUserFromOrganization(organizationId, user.id, signal))) {
				return Result.failure(
					UseCaseError.notFound('MEMBERSHIP_NOT_FOUND', 'User is not part of the organization', {
						organizationId,
						userEmail,
					}),
				);
			}

			return Result.success({ organizationId, userId: user.id });
		},
	};
}
