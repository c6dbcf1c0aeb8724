/**
 * Delete Permission Use Case
 *
 * The usage check and the delete run in one store transaction, so a grant
 * added concurrently cannot leave a dangling role_permissions row.
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { Permission } from '../../../domain/index.js';
import type { PermissionCache } from '../../../authorization/index.js';
import type { PermissionStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { DeletePermissionCommand } from './command.js';

export interface DeletePermissionUseCaseDeps {
	readonly store: Pick<PermissionStore, 'getPermissionById' | 'deletePermission'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createDeletePermissionUseCase(
	deps: DeletePermissionUseCaseDeps,
): UseCase<DeletePermissionCommand, Permission> {
	const { store, permissionCache } = deps;

	return {
		async execute(command: DeletePermissionCommand, context: ExecutionContext): Promise<Result<Permission>> {
			const { signal } = context;
			const { permissionId } = command;

			const permission = await store.getPermissionById(permissionId, signal);
			if (!permission) {
				return Result.failure(UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found', { permissionId }));
			}

			const outcome = await commitRbacChange(permissionCache, () => store.deletePermission(permissionId));
			switch (outcome) {
				case 'in_use':
					return Result.failure(
						UseCaseError.conflict('PERMISSION_IN_USE', 'Permission is assigned to one or more roles', {
							permissionId,
						}),
					);
				case 'not_found':
					return Result.failure(
						UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found', { permissionId }),
					);
				case 'deleted':
					return refreshPermissions(permissionCache, permission);
			}
		},
	};
}
