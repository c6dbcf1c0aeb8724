/**
 * Context API
 *
 * Switch the active organization and team, read the current and available
 * contexts, and the caller's role in an organization or team. Needs a
 * principal but no organization or team scope.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { Type } from '@sinclair/typebox';
import { CommonSchemas, badRequest, jsonSuccess, parseIdParam, safeValidate, sendError, sendResult } from '@tenantgate/http';
import { UseCaseError } from '@tenantgate/application';

import type { AuthenticatedPrincipal } from '../authorization/index.js';
import type { ContextSwitchService } from '../context/index.js';

const SwitchOrganizationSchema = Type.Object({
	organizationId: CommonSchemas.Id,
});

const SwitchTeamSchema = Type.Object({
	teamId: CommonSchemas.Id,
});

const SwitchContextSchema = Type.Object({
	organizationId: Type.Optional(CommonSchemas.Id),
	teamId: Type.Optional(CommonSchemas.Id),
});

export interface ContextRoutesDeps {
	readonly contextSwitchService: ContextSwitchService;
}

function principalOf(request: FastifyRequest, reply: FastifyReply): AuthenticatedPrincipal | null {
	if (!request.principal) {
		sendError(reply, UseCaseError.unauthorized('NOT_AUTHENTICATED', 'Not authenticated'));
		return null;
	}
	return request.principal;
}

export async function registerContextRoutes(fastify: FastifyInstance, deps: ContextRoutesDeps): Promise<void> {
	const { contextSwitchService } = deps;
	const schema = { tags: ['Context'] };

	// POST /rbac/context/switch-organization
	fastify.post(
		'/rbac/context/switch-organization',
		{ schema: { ...schema, summary: 'Activate an organization' } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const bodyResult = safeValidate(request.body, SwitchOrganizationSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await contextSwitchService.switchOrganization(
				principal.user,
				bodyResult.data.organizationId,
				request.executionContext.signal,
			);
			return sendResult(reply, result);
		},
	);

	// POST /rbac/context/switch-team
	fastify.post(
		'/rbac/context/switch-team',
		{ schema: { ...schema, summary: 'Activate a team and its organization' } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const bodyResult = safeValidate(request.body, SwitchTeamSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await contextSwitchService.switchTeam(
				principal.user,
				bodyResult.data.teamId,
				request.executionContext.signal,
			);
			return sendResult(reply, result);
		},
	);

	// POST /rbac/context/switch-context
	fastify.post(
		'/rbac/context/switch-context',
		{ schema: { ...schema, summary: 'Activate an organization and/or team' } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const bodyResult = safeValidate(request.body, SwitchContextSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await contextSwitchService.switchContext(
				principal.user,
				bodyResult.data,
				request.executionContext.signal,
			);
			return sendResult(reply, result);
		},
	);

	// GET /rbac/context/current
	fastify.get(
		'/rbac/context/current',
		{ schema: { ...schema, summary: 'Context carried by the bearer token' } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			return jsonSuccess(reply, contextSwitchService.getCurrentContext(principal.claims));
		},
	);

	// GET /rbac/context/available
	fastify.get(
		'/rbac/context/available',
		{ schema: { ...schema, summary: 'Organizations and teams the user can switch to' } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const available = await contextSwitchService.getAvailableContexts(
				principal.user,
				request.executionContext.signal,
			);
			return jsonSuccess(reply, available);
		},
	);

	// GET /rbac/context/current-role/organization/:organizationId
	fastify.get<{ Params: { organizationId: string } }>(
		'/rbac/context/current-role/organization/:organizationId',
		{ schema: { ...schema, summary: "The caller's role in an organization" } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const organizationId = parseIdParam(request.params.organizationId);
			if (organizationId === null) {
				return badRequest(reply, 'organizationId must be a positive integer');
			}

			const result = await contextSwitchService.getRoleInOrganization(
				principal.user,
				organizationId,
				request.executionContext.signal,
			);
			return sendResult(reply, result);
		},
	);

	// GET /rbac/context/current-role/team/:teamId
	fastify.get<{ Params: { teamId: string } }>(
		'/rbac/context/current-role/team/:teamId',
		{ schema: { ...schema, summary: "The caller's role in a team" } },
		async (request, reply) => {
			const principal = principalOf(request, reply);
			if (!principal) return reply;

			const teamId = parseIdParam(request.params.teamId);
			if (teamId === null) {
				return badRequest(reply, 'teamId must be a positive integer');
			}

			const result = await contextSwitchService.getRoleInTeam(principal.user, teamId, request.executionContext.signal);
			return sendResult(reply, result);
		},
	);
}
