/**
 * Create Role Use Case
 *
 * Creates a role, optionally inheriting from a parent role of the same scope.
 */

import type { UseCase } from '@tenantgate/application';
import { validateOneOf, validateRequired, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import { SCOPES, createSlug, type Role } from '../../../domain/index.js';
import type { PermissionCache } from '../../../authorization/index.js';
import type { RoleStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { CreateRoleCommand } from './command.js';

export interface CreateRoleUseCaseDeps {
	readonly store: Pick<RoleStore, 'createRole' | 'getRoleById' | 'getRoleByName' | 'getRoleBySlug'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createCreateRoleUseCase(deps: CreateRoleUseCaseDeps): UseCase<CreateRoleCommand, Role> {
	const { store, permissionCache } = deps;

	return {
		async execute(command: CreateRoleCommand, context: ExecutionContext): Promise<Result<Role>> {
			const { signal } = context;

			const nameResult = validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD');
			if (Result.isFailure(nameResult)) {
				return nameResult;
			}
			const name = command.name.trim();

			const scopeResult = validateOneOf(command.scope, SCOPES, 'scope', 'INVALID_SCOPE');
			if (Result.isFailure(scopeResult)) {
				return scopeResult;
			}
			const scope = scopeResult.value;

			const slugResult = createSlug(command.slug ?? name);
			if (Result.isFailure(slugResult)) {
				return slugResult;
			}
			const slug = slugResult.value;

			if (await store.getRoleByName(name, signal)) {
				return Result.failure(
					UseCaseError.conflict('ROLE_NAME_EXISTS', `Role with name '${name}' already exists`, { name }),
				);
			}
			if (await store.getRoleBySlug(slug, signal)) {
				return Result.failure(
					UseCaseError.conflict('ROLE_SLUG_EXISTS', `Role with slug '${slug}' already exists`, { slug }),
				);
			}

			const inheritsRoleId = command.inheritsRoleId ?? null;
			if (inheritsRoleId !== null) {
				const parent = await store.getRoleById(inheritsRoleId, signal);
				if (!parent) {
					return Result.failure(
						UseCaseError.notFound('ROLE_NOT_FOUND', 'Inherited role not found', { roleId: inheritsRoleId }),
					);
				}
				if (parent.scope !== scope) {
					return Result.failure(
						UseCaseError.validation('INVALID_INHERITANCE', 'A role can only inherit from a role of the same scope', {
							scope,
							parentScope: parent.scope,
						}),
					);
				}
			}

			const role = await commitRbacChange(permissionCache, () =>
				store.createRole({ name, slug, description: command.description ?? null, scope, inheritsRoleId }),
			);

			return refreshPermissions(permissionCache, role);
		},
	};
}
