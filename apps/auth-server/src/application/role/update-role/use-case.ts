/**
 * Update Role Use Case
 *
 * Renames a role, changes its slug or description, or re-parents it. A new
 * parent must share the role's scope and must not have the role among its
 * own ancestors.
 */

import type { UseCase } from '@tenantgate/application';
import { validateRequired, Result, UseCaseError, type ExecutionContext } from '@tenantgate/application';

import { createSlug, type Role, type RolePatch } from '../../../domain/index.js';
import { MAX_INHERITANCE_DEPTH, type PermissionCache } from '../../../authorization/index.js';
import type { RoleStore } from '../../../infrastructure/persistence/index.js';
import { commitRbacChange, refreshPermissions } from '../../refresh-permissions.js';

import type { UpdateRoleCommand } from './command.js';

export interface UpdateRoleUseCaseDeps {
	readonly store: Pick<RoleStore, 'getRoleById' | 'getRoleByName' | 'getRoleBySlug' | 'updateRole'>;
	readonly permissionCache: Pick<PermissionCache, 'refresh'>;
}

function invalidInheritance(message: string, details: Record<string, unknown>) {
	return Result.failure(UseCaseError.validation('INVALID_INHERITANCE', message, details));
}

export function createUpdateRoleUseCase(deps: UpdateRoleUseCaseDeps): UseCase<UpdateRoleCommand, Role> {
	const { store, permissionCache } = deps;

	/**
	 * Walk up from `parentId`; true when `roleId` is reached or the chain is
	 * longer than the resolver would follow.
	 */
	async function wouldCycle(roleId: number, parentId: number, signal: AbortSignal): Promise<boolean> {
		let currentId: number | null = parentId;
		for (let hops = 0; currentId !== null; hops++) {
			if (currentId === roleId || hops >= MAX_INHERITANCE_DEPTH) return true;
			const current: Role | null = await store.getRoleById(currentId, signal);
			currentId = current?.inheritsRoleId ?? null;
		}
		return false;
	}

	return {
		async execute(command: UpdateRoleCommand, context: ExecutionContext): Promise<Result<Role>> {
			const { signal } = context;

			const existing = await store.getRoleById(command.roleId, signal);
			if (!existing) {
				return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId: command.roleId }));
			}

			const patch: { -readonly [K in keyof RolePatch]: RolePatch[K] } = {};

			if (command.name !== undefined) {
				const nameResult = validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD');
				if (Result.isFailure(nameResult)) {
					return nameResult;
				}
				const name = command.name.trim();
				if (name !== existing.name) {
					const conflict = await store.getRoleByName(name, signal);
					if (conflict && conflict.id !== existing.id) {
						return Result.failure(
							UseCaseError.conflict('ROLE_NAME_EXISTS', `Role with name '${name}' already exists`, { name }),
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
					const conflict = await store.getRoleBySlug(slug, signal);
					if (conflict && conflict.id !== existing.id) {
						return Result.failure(
							UseCaseError.conflict('ROLE_SLUG_EXISTS', `Role with slug '${slug}' already exists`, { slug }),
						);
					}
					patch.slug = slug;
				}
			}

			if (command.description !== undefined) {
				patch.description = command.description;
			}

			if (command.inheritsRoleId !== undefined && command.inheritsRoleId !== existing.inheritsRoleId) {
				const parentId = command.inheritsRoleId;
				if (parentId !== null) {
					if (parentId === existing.id) {
						return invalidInheritance('A role cannot inherit from itself', { roleId: existing.id });
					}
					const parent = await store.getRoleById(parentId, signal);
					if (!parent) {
						return Result.failure(
							UseCaseError.notFound('ROLE_NOT_FOUND', 'Inherited role not found', { roleId: parentId }),
						);
					}
					if (parent.scope !== existing.scope) {
						return invalidInheritance('A role can only inherit from a role of the same scope', {
							scope: existing.scope,
							parentScope: parent.scope,
						});
					}
					if (await wouldCycle(existing.id, parentId, signal)) {
						return invalidInheritance('Inheritance would form a cycle', {
							roleId: existing.id,
							inheritsRoleId: parentId,
						});
					}
				}
				patch.inheritsRoleId = parentId;
			}

			if (Object.keys(patch).length === 0) {
				return Result.success(existing);
			}

			const updated = await commitRbacChange(permissionCache, () => store.updateRole(existing.id, patch));
			if (!updated) {
				return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId: existing.id }));
			}

			return refreshPermissions(permissionCache, updated);
		},
	};
}
