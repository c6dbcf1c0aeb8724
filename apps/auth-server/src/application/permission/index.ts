export type { CreatePermissionCommand } from './create-permission/command.js';
export { createCreatePermissionUseCase, type CreatePermissionUseCaseDeps } from './create-permission/use-case.js';

export type { UpdatePermissionCommand } from './update-permission/command.js';
export { createUpdatePermissionUseCase, type UpdatePermissionUseCaseDeps } from './update-permission/use-case.js';

export type { DeletePermissionCommand } from './delete-permission/command.js';
export { createDeletePermissionUseCase, type DeletePermissionUseCaseDeps } from './delete-permission/use-case.js';

export type { AssignPermissionToRoleCommand } from './assign-permission-to-role/command.js';
export {
	createAssignPermissionToRoleUseCase,
	type AssignPermissionToRoleUseCaseDeps,
	type PermissionAssignment,
} from './assign-permission-to-role/use-case.js';

export type { RemovePermissionFromRoleCommand } from './remove-permission-from-role/command.js';
export {
	createRemovePermissionFromRoleUseCase,
	type RemovePermissionFromRoleUseCaseDeps,
} from './remove-permission-from-role/use-case.js';

export { validatePermissionName, permissionSlugSource } from './validate-permission-name.js';
