/**
 * Composition
 *
 * Wires the store, permission cache, token service and password hasher into
 * the context switch service, the use cases and the authorization pipeline.
 * The entry point and the HTTP tests build their server from the same
 * dependencies.
 */

import { createComponentLogger, type Logger } from '@tenantgate/logging';

import {
	createAssignPermissionToRoleUseCase,
	createAssignUserToOrganizationUseCase,
	createAssignUserToTeamUseCase,
	createCreatePermissionUseCase,
	createCreateRoleUseCase,
	createCreateTeamUseCase,
	createDeletePermissionUseCase,
	createDeleteRoleUseCase,
	createLoginUseCase,
	createRemovePermissionFromRoleUseCase,
	createRemoveUserFromOrganizationUseCase,
	createRemoveUserFromTeamUseCase,
	createUpdatePermissionUseCase,
	createUpdateRoleUseCase,
} from './application/index.js';
import type { PasswordHasher, TokenService } from './auth/index.js';
import type { PermissionCache } from './authorization/index.js';
import { createContextSwitchService } from './context/index.js';
import type { RbacStore } from './infrastructure/persistence/index.js';
import type { ServerDeps } from './server.js';

export interface CoreServices {
	readonly store: RbacStore;
	readonly permissionCache: PermissionCache;
	readonly tokenService: TokenService;
	readonly passwords: PasswordHasher;
	readonly logger: Logger;
}

export function createServerDeps(services: CoreServices): ServerDeps {
	const { store, permissionCache, tokenService, passwords, logger } = services;
	const rbac = { store, permissionCache };

	return {
		store,
		permissionCache,
		tokenService,
		authorization: {
			tokens: tokenService,
			store,
			permissionCache,
			logger: createComponentLogger(logger, 'authorization'),
		},
		contextSwitchService: createContextSwitchService({
			store,
			tokens: tokenService,
			logger: createComponentLogger(logger, 'context'),
		}),

		loginUseCase: createLoginUseCase({
			store,
			tokens: tokenService,
			passwords,
			logger: createComponentLogger(logger, 'login'),
		}),

		createRoleUseCase: createCreateRoleUseCase(rbac),
		updateRoleUseCase: createUpdateRoleUseCase(rbac),
		deleteRoleUseCase: createDeleteRoleUseCase(rbac),

		createPermissionUseCase: createCreatePermissionUseCase(rbac),
		updatePermissionUseCase: createUpdatePermissionUseCase(rbac),
		deletePermissionUseCase: createDeletePermissionUseCase(rbac),
		assignPermissionToRoleUseCase: createAssignPermissionToRoleUseCase(rbac),
		removePermissionFromRoleUseCase: createRemovePermissionFromRoleUseCase(rbac),

		createTeamUseCase: createCreateTeamUseCase({ store }),
		assignUserToTeamUseCase: createAssignUserToTeamUseCase({ store }),
		removeUserFromTeamUseCase: createRemoveUserFromTeamUseCase({ store }),
		assignUserToOrganizationUseCase: createAssignUserToOrganizationUseCase({ store }),
		removeUserFromOrganizationUseCase: createRemoveUserFromOrganizationUseCase({ store }),
	};
}
