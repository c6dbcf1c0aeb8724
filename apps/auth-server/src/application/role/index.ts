export type { CreateRoleCommand } from './create-role/command.js';
export { createCreateRoleUseCase, type CreateRoleUseCaseDeps } from './create-role/use-case.js';

export type { UpdateRoleCommand } from './update-role/command.js';
export { createUpdateRoleUseCase, type UpdateRoleUseCaseDeps } from './update-role/use-case.js';

export type { DeleteRoleCommand } from './delete-role/command.js';
export { createDeleteRoleUseCase, type DeleteRoleUseCaseDeps } from './delete-role/use-case.js';
