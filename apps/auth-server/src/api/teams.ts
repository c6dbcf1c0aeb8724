/**
 * Teams API
 *
 * Team creation and membership. Paths name the organization or team they act
 * on, which is what the authorization hook scopes them by.
 */

import type { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import {
	CommonSchemas,
	badRequest,
	jsonSuccess,
	notFound,
	parseIdParam,
	safeValidate,
	sendResult,
} from '@tenantgate/http';
import type { UseCase } from '@tenantgate/application';

import type {
	AssignUserToTeamCommand,
	CreateTeamCommand,
	RemoveUserFromTeamCommand,
	TeamAssignment,
	TeamRemoval,
} from '../application/index.js';
import type { Team } from '../domain/index.js';
import type { DirectoryStore } from '../infrastructure/persistence/index.js';
import { toTeamResponse } from './responses.js';

const CreateTeamSchema = Type.Object({
	name: Type.String({ minLength: 1 }),
	description: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
});

const AssignUserSchema = Type.Object({
	userEmail: Type.String({ minLength: 3, maxLength: 320 }),
	roleId: CommonSchemas.Id,
});

const RemoveUserSchema = Type.Object({
	userEmail: Type.String({ minLength: 3, maxLength: 320 }),
});

export interface TeamsRoutesDeps {
	readonly store: Pick<DirectoryStore, 'getOrganizationById' | 'getTeamById' | 'listTeamsOfOrganization'>;
	readonly createTeamUseCase: UseCase<CreateTeamCommand, Team>;
	readonly assignUserToTeamUseCase: UseCase<AssignUserToTeamCommand, TeamAssignment>;
	readonly removeUserFromTeamUseCase: UseCase<RemoveUserFromTeamCommand, TeamRemoval>;
}

interface OrganizationParams {
	organizationId: string;
}

interface TeamParams {
	teamId: string;
}

export async function registerTeamsRoutes(fastify: FastifyInstance, deps: TeamsRoutesDeps): Promise<void> {
	const { store, createTeamUseCase, assignUserToTeamUseCase, removeUserFromTeamUseCase } = deps;
	const schema = { tags: ['Teams'] };

	// POST /rbac/organizations/:organizationId/teams/create - Create team
	fastify.post<{ Params: OrganizationParams }>(
		'/rbac/organizations/:organizationId/teams/create',
		{ schema: { ...schema, summary: 'Create a team in an organization' } },
		async (request, reply) => {
			const organizationId = parseIdParam(request.params.organizationId);
			if (organizationId === null) {
				return badRequest(reply, 'organizationId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, CreateTeamSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await createTeamUseCase.execute(
				{ organizationId, ...bodyResult.data },
				request.executionContext,
			);
			return sendResult(reply, result, { successStatus: 201, transform: toTeamResponse });
		},
	);

	// GET /rbac/organizations/:organizationId/teams - List teams of an organization
	fastify.get<{ Params: OrganizationParams }>(
		'/rbac/organizations/:organizationId/teams',
		{ schema: { ...schema, summary: 'List the teams of an organization' } },
		async (request, reply) => {
			const organizationId = parseIdParam(request.params.organizationId);
			if (organizationId === null) {
				return badRequest(reply, 'organizationId must be a positive integer');
			}

			const { signal } = request.executionContext;
			const organization = await store.getOrganizationById(organizationId, signal);
			if (!organization) {
				return notFound(reply, 'ORGANIZATION_NOT_FOUND', 'Organization not found');
			}
			const teams = await store.listTeamsOfOrganization(organizationId, signal);
			return jsonSuccess(reply, { teams: teams.map(toTeamResponse), total: teams.length });
		},
	);

	// GET /rbac/teams/:teamId - Get team
	fastify.get<{ Params: TeamParams }>(
		'/rbac/teams/:teamId',
		{ schema: { ...schema, summary: 'Get a team' } },
		async (request, reply) => {
			const teamId = parseIdParam(request.params.teamId);
			if (teamId === null) {
				return badRequest(reply, 'teamId must be a positive integer');
			}

			const team = await store.getTeamById(teamId, request.executionContext.signal);
			if (!team) {
				return notFound(reply, 'TEAM_NOT_FOUND', 'Team not found');
			}
			return jsonSuccess(reply, toTeamResponse(team));
		},
	);

	// POST /rbac/teams/:teamId/assign-user - Add a user or change their team role
	fastify.post<{ Params: TeamParams }>(
		'/rbac/teams/:teamId/assign-user',
		{ schema: { ...schema, summary: 'Assign a user to a team' } },
		async (request, reply) => {
			const teamId = parseIdParam(request.params.teamId);
			if (teamId === null) {
				return badRequest(reply, 'teamId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, AssignUserSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await assignUserToTeamUseCase.execute({ teamId, ...bodyResult.data }, request.executionContext);
			return sendResult(reply, result);
		},
	);

	// DELETE /rbac/teams/:teamId/remove-user - Remove a user from a team
	fastify.delete<{ Params: TeamParams }>(
		'/rbac/teams/:teamId/remove-user',
		{ schema: { ...schema, summary: 'Remove a user from a team' } },
		async (request, reply) => {
			const teamId = parseIdParam(request.params.teamId);
			if (teamId === null) {
				return badRequest(reply, 'teamId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, RemoveUserSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await removeUserFromTeamUseCase.execute(
				{ teamId, userEmail: bodyResult.data.userEmail },
				request.executionContext,
			);
			return sendResult(reply, result);
		},
	);
}
