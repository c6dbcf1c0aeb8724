import { Result, UseCaseError } from '@tenantgate/application';
import type { Role, Scope } from '../../domain/index.js';
import type { RoleStore } from '../../infrastructure/persistence/index.js';

/**
 * Load a role and require it to apply at `scope`.
 */
export async function findRoleForScope(
	store: Pick<RoleStore, 'getRoleById'>,
	roleId: number,
	scope: Scope,
	signal: AbortSignal,
): Promise<Result<Role>> {
	const role = await store.getRoleById(roleId, signal);
	if (!role) {
		return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId }));
	}
	if (role.scope !== scope) {
		return Result.failure(
			UseCaseError.validation('SCOPE_MISMATCH', `Role '${role.name}' is not a ${scope} role`, {
				roleId,
				roleScope: role.scope,
				expectedScope: scope,
			}),
		);
	}
	return Result.success(role);
}
