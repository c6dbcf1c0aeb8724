/**
 * Delete Role Use Case
 *
 * A role still referenced by a membership, a global assignment or a child
 * role is kept.
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { Role } from '../../../domain/index.js';
import type { PermissionCache } from '../../../authorization/index.js';
import type { RoleStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { DeleteRoleCommand } from './command.js';

export interface DeleteRoleUseCaseDeps {
	readonly store: Pick<RoleStore, 'getRoleById' | 'isRoleInUse' | 'deleteRole'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createDeleteRoleUseCase(deps: DeleteRoleUseCaseDeps): UseCase<DeleteRoleCommand, Role> {
	const { store, permissionCache } = deps;

	return {
		async execute(command: DeleteRoleCommand, context: ExecutionContext): Promise<Result<Role>> {
			const { signal } = context;

			const role = await store.getRoleById(command.roleId, signal);
			if (!role) {
				return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId: command.roleId }));
			}

			if (await store.isRoleInUse(role.id, signal)) {
				return Result.failure(
					UseCaseError.conflict('ROLE_IN_USE', 'Role is assigned to users or inherited by other roles', {
						roleId: role.id,
					}),
				);
			}

			if (!(await commitRbacChange(permissionCache, () => store.deleteRole(role.id)))) {
				return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId: role.id }));
			}

			return refreshPermissions(permissionCache, role);
		},
	};
}
