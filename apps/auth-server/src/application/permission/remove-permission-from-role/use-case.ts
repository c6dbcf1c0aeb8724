/**
 * Remove Permission From Role Use Case
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { PermissionCache } from '../../../authorization/index.js';
import type { PermissionStore, RoleStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { RemovePermissionFromRoleCommand } from './command.js';

export interface RemovePermissionFromRoleUseCaseDeps {
	readonly store: Pick<RoleStore & PermissionStore, 'getRoleById' | 'getPermissionById' | 'removePermissionFromRole'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createRemovePermissionFromRoleUseCase(
	deps: RemovePermissionFromRoleUseCaseDeps,
): UseCase<RemovePermissionFromRoleCommand, RemovePermissionFromRoleCommand> {
	const { store, permissionCache } = deps;

	return {
		async execute(
			command: RemovePermissionFromRoleCommand,
			context: ExecutionContext,
		): Promise<Result<RemovePermissionFromRoleCommand>> {
			const { signal } = context;
			const { roleId, permissionId } = command;

			const [role, permission] = await Promise.all([
				store.getRoleById(roleId, signal),
				store.getPermissionById(permissionId, signal),
			]);
			if (!role) {
				return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId }));
			}
			if (!permission) {
				return Result.failure(UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found', { permissionId }));
			}

			const removed = await commitRbacChange(permissionCache, () =>
				store.removePermissionFromRole(roleId, permissionId),
			);
			if (!removed) {
				return Result.failure(
					UseCaseError.notFound('PERMISSION_NOT_ASSIGNED', 'Permission is not assigned to this role', {
						roleId,
						permissionId,
					}),
				);
			}

			return refreshPermissions(permissionCache, { roleId, permissionId });
		},
	};
}
