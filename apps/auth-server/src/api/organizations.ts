/**
 * Organizations API
 */

import type { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import { CommonSchemas, badRequest, parseIdParam, safeValidate, sendResult } from '@tenantgate/http';
import type { UseCase } from '@tenantgate/application';

import type {
	AssignUserToOrganizationCommand,
	OrganizationAssignment,
	OrganizationRemoval,
	RemoveUserFromOrganizationCommand,
} from '../application/index.js';

const AssignUserSchema = Type.Object({
	userEmail: Type.String({ minLength: 3, maxLength: 320 }),
	roleId: CommonSchemas.Id,
});

const RemoveUserSchema = Type.Object({
	userEmail: Type.String({ minLength: 3, maxLength: 320 }),
});

export interface OrganizationsRoutesDeps {
	readonly assignUserToOrganizationUseCase: UseCase<AssignUserToOrganizationCommand, OrganizationAssignment>;
	readonly removeUserFromOrganizationUseCase: UseCase<RemoveUserFromOrganizationCommand, OrganizationRemoval>;
}

export async function registerOrganizationsRoutes(
	fastify: FastifyInstance,
	deps: OrganizationsRoutesDeps,
): Promise<void> {
	const { assignUserToOrganizationUseCase, removeUserFromOrganizationUseCase } = deps;

	// POST /rbac/organizations/:organizationId/assign-user - Add a user or change their organization role
	fastify.post<{ Params: { organizationId: string } }>(
		'/rbac/organizations/:organizationId/assign-user',
		{ schema: { tags: ['Organizations'], summary: 'Assign a user to an organization' } },
		async (request, reply) => {
			const organizationId = parseIdParam(request.params.organizationId);
			if (organizationId === null) {
				return badRequest(reply, 'organizationId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, AssignUserSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await assignUserToOrganizationUseCase.execute(
				{ organizationId, ...bodyResult.data },
				request.executionContext,
			);
			return sendResult(reply, result);
		},
	);

	// DELETE /rbac/organizations/:organizationId/remove-user - Remove a user from an organization and its teams
	fastify.delete<{ Params: { organizationId: string } }>(
		'/rbac/organizations/:organizationId/remove-user',
		{ schema: { tags: ['Organizations'], summary: 'Remove a user from an organization' } },
		async (request, reply) => {
			const organizationId = parseIdParam(request.params.organizationId);
			if (organizationId === null) {
				return badRequest(reply, 'organizationId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, RemoveUserSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await removeUserFromOrganizationUseCase.execute(
				{ organizationId, userEmail: bodyResult.data.userEmail },
				request.executionContext,
			);
			return sendResult(reply, result);
		},
	);
}
