/**
 * Assign Permission To Role Use Case
 *
 * Idempotent in effect: a second assignment of the same pair writes nothing
 * and reports `success: false`.
 */

import type { UseCase } from '@tenantgate/application';
import { Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import type { PermissionCache } from '../../../authorization/index.js';
import type { PermissionStore, RoleStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { AssignPermissionToRoleCommand } from './command.js';

export interface PermissionAssignment {
	/** False when the role already held the permission */
	readonly success: boolean;
	readonly roleId: number;
	readonly permissionId: number;
}

export interface AssignPermissionToRoleUseCaseDeps {
	readonly store: Pick<RoleStore & PermissionStore, 'getRoleById' | 'getPermissionById' | 'assignPermissionToRole'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createAssignPermissionToRoleUseCase(
	deps: AssignPermissionToRoleUseCaseDeps,
): UseCase<AssignPermissionToRoleCommand, PermissionAssignment> {
	const { store, permissionCache } = deps;

	return {
		async execute(
			command: AssignPermissionToRoleCommand,
			context: ExecutionContext,
		): Promise<Result<PermissionAssignment>> {
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

			const inserted = await commitRbacChange(permissionCache, () =>
				store.assignPermissionToRole(roleId, permissionId),
			);
			const assignment: PermissionAssignment = { success: inserted, roleId, permissionId };
			if (!inserted) {
				return Result.success(assignment);
			}

			return refreshPermissions(permissionCache, assignment);
		},
	};
}
