export type { CreateTeamCommand } from './create-team/command.js';
export { createCreateTeamUseCase, type CreateTeamUseCaseDeps } from './create-team/use-case.js';

export type { AssignUserToTeamCommand } from './assign-user-to-team/command.js';
export {
	createAssignUserToTeamUseCase,
	type AssignUserToTeamUseCaseDeps,
	type TeamAssignment,
} from './assign-user-to-team/use-case.js';

export type { RemoveUserFromTeamCommand } from './remove-user-from-team/command.js';
export {
	createRemoveUserFromTeamUseCase,
	type RemoveUserFromTeamUseCaseDeps,
	type TeamRemoval,
} from './remove-user-from-team/use-case.js';

export type { AssignUserToOrganizationCommand } from './assign-user-to-organization/command.js';
export {
	createAssignUserToOrganizationUseCase,
	type AssignUserToOrganizationUseCaseDeps,
	type OrganizationAssignment,
} from './assign-user-to-organization/use-case.js';

export type { RemoveUserFromOrganizationCommand } from './remove-user-from-organization/command.js';
export {
	createRemoveUserFromOrganizationUseCase,
	type RemoveUserFromOrganizationUseCaseDeps,
	type OrganizationRemoval,
} from './remove-user-from-organization/use-case.js';
