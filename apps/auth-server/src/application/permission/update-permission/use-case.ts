/**
 * Update Permission Use Case
 */

import type { UseCase } from '@tenantgate/application';
import { validateOneOf, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import { SCOPES, createSlug, type Permission, type PermissionPatch } from '../../../domain/index.js';
import type { PermissionCache } from '../../../authorization/index.js';
import type { PermissionStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';
import { validatePermissionName } from '../validate-permission-name.js';

import type { UpdatePermissionCommand } from './command.js';

export interface UpdatePermissionUseCaseDeps {
	readonly store: Pick<
		PermissionStore,
		'getPermissionById' | 'getPermissionByName' | 'getPermissionBySlug' | 'updatePermission'
	>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

export function createUpdatePermissionUseCase(
	deps: UpdatePermissionUseCaseDeps,
): UseCase<UpdatePermissionCommand, Permission> {
	const { store, permissionCache } = deps;

	return {
		async execute(command: UpdatePermissionCommand, context: ExecutionContext): Promise<Result<Permission>> {
			const { signal } = context;

			const existing = await store.getPermissionById(command.permissionId, signal);
			if (!existing) {
				return Result.failure(
					UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found', {
						permissionId: command.permissionId,
					}),
				);
			}

			const patch: { -readonly [K in keyof PermissionPatch]: PermissionPatch[K] } = {};

			if (command.name !== undefined) {
				const nameResult = validatePermissionName(command.name);
				if (Result.isFailure(nameResult)) {
					return nameResult;
				}
				const name = nameResult.value;
				if (name !== existing.name) {
					const conflict = await store.getPermissionByName(name, signal);
					if (conflict && conflict.id !== existing.id) {
						return Result.failure(
							UseCaseError.conflict('PERMISSION_NAME_EXISTS', `Permission name '${name}' already exists`, { name }),
						);
					}
					patch.name = name;
				}
			}

			if (command.slug !== undefined) {
				const slugResult = createSlug(command.slug);
				if (Result.isFailure(slugResult)) {
					return slugResult;
				}
				const slug = slugResult.value;
				if (slug !== existing.slug) {
					const conflict = await store.getPermissionBySlug(slug, signal);
					if (conflict && conflict.id !== existing.id) {
						return Result.failure(
							UseCaseError.conflict('PERMISSION_SLUG_EXISTS', `Permission with slug '${slug}' already exists`, {
								slug,
							}),
						);
					}
					patch.slug = slug;
				}
			}

			if (command.scope !== undefined) {
				const scopeResult = validateOneOf(command.scope, SCOPES, 'scope', 'INVALID_SCOPE');
				if (Result.isFailure(scopeResult)) {
					return scopeResult;
				}
				patch.scope = scopeResult.value;
			}

			if (command.description !== undefined) {
				patch.description = command.description;
			}

			if (Object.keys(patch).length === 0) {
				return Result.success(existing);
			}

			const updated = await commitRbacChange(permissionCache, () => store.updatePermission(existing.id, patch));
			if (!updated) {
				return Result.failure(
					UseCaseError.notFound('PERMISSION_NOT_FOUND', 'Permission not found', { permissionId: existing.id }),
				);
			}

			return refreshPermissions(permissionCache, updated);
		},
	};
}
