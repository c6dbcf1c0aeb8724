/**
 * Create Permission Use Case
 *
 * The name is checked against the permission grammar before anything is
 * written, so the permission cache never meets an unparseable name.
 */

import type { UseCase } from '@tenantgate/application';
import { validateOneOf, validateRequired, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import { SCOPES, createSlug, type Permission } from '../../../domain/index.js';
import type { PermissionCache } from '../../../authorization/index.js';
import type { PermissionStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';
import { permissionSlugSource, validatePermissionName } from '../validate-permission-name.js';

import type { CreatePermissionCommand } from './command.js';

export interface CreatePermissionUseCaseDeps {
	readonly store: Pick<PermissionStore, 'createPermission' | 'getPermissionByName' | 'getPermissionBySlug'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createCreatePermissionUseCase(
	deps: CreatePermissionUseCaseDeps,
): UseCase<CreatePermissionCommand, Permission> {
	const { store, permissionCache } = deps;

	return {
		async execute(command: CreatePermissionCommand, context: ExecutionContext): Promise<Result<Permission>> {
			const { signal } = context;

			const requiredResult = validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD');
			if (Result.isFailure(requiredResult)) {
				return requiredResult;
			}

			const nameResult = validatePermissionName(command.name);
			if (Result.isFailure(nameResult)) {
				return nameResult;
			}
			const name = nameResult.value;

			const scopeResult = validateOneOf(command.scope, SCOPES, 'scope', 'INVALID_SCOPE');
			if (Result.isFailure(scopeResult)) {
				return scopeResult;
			}

			const slugResult = createSlug(command.slug ?? permissionSlugSource(name));
			if (Result.isFailure(slugResult)) {
				return slugResult;
			}
			const slug = slugResult.value;

			if (await store.getPermissionByName(name, signal)) {
				return Result.failure(
					UseCaseError.conflict('PERMISSION_NAME_EXISTS', `Permission '${name}' already exists`, { name }),
				);
			}
			if (await store.getPermissionBySlug(slug, signal)) {
				return Result.failure(
					UseCaseError.conflict('PERMISSION_SLUG_EXISTS', `Permission with slug '${slug}' already exists`, { slug }),
				);
			}

			const scope = scopeResult.value;
			const permission = await commitRbacChange(permissionCache, () =>
				store.createPermission({ name, slug, description: command.description ?? null, scope }),
			);

			return refreshPermissions(permissionCache, permission);
		},
	};
}
