/**
 * Assign User To Organization Use Case
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { MembershipAssignmentOutcome } from '../../../domain/index.js';
import type { DirectoryStore, MembershipStore, RoleStore } from '../../../infrastructure/persistence/index.js';
import { findRoleForScope } from '../role-scope.js';

import type { AssignUserToOrganizationCommand } from './command.js';

export interface OrganizationAssignment {
	readonly organizationId: number;
	readonly userId: number;
	readonly roleId: number;
	readonly outcome: MembershipAssignmentOutcome;
}

export interface AssignUserToOrganizationUseCaseDeps {
	readonly store: Pick<
		DirectoryStore & MembershipStore & RoleStore,
		'getOrganizationById' | 'getUserByEmail' | 'getRoleById' | 'assignUserToOrganization'
	>;
}

export function createAssignUserToOrganizationUseCase(
	deps: AssignUserToOrganizationUseCaseDeps,
): UseCase<AssignUserToOrganizationCommand, OrganizationAssignment> {
	const { store } = deps;

	return {
		async execute(
			command: AssignUserToOrganizationCommand,
			context: ExecutionContext,
		): Promise<Result<OrganizationAssignment>> {
			const { signal } = context;
			const { organizationId, roleId } = command;

			const organization = await store.getOrganizationById(organizationId, signal);
			if (!organization) {
				return Result.failure(
					UseCaseError.notFound('ORGANIZATION_NOT_FOUND', 'Organization not found', { organizationId }),
				);
			}

			const user = await store.getUserByEmail(command.userEmail, signal);
			if (!user) {
				return Result.failure(
					UseCaseError.notFound('USER_NOT_FOUND', 'User not found', { userEmail: command.userEmail }),
				);
			}

			const roleResult = await findRoleForScope(store, roleId, 'organization', signal);
			if (Result.isFailure(roleResult)) {
				return roleResult;
			}

			const outcome = await store.assignUserToOrganization(organizationId, user.id, roleId, signal);
			return Result.success({ organizationId, userId: user.id, roleId, outcome });
		},
	};
}
