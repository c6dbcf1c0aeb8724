/**
 * Roles API
 *
 * Role management and role/permission assignment. These paths carry no
 * organization or team id, so only the global super admin reaches them.
 */

import type { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import { badRequest, jsonSuccess, notFound, parseIdParam, safeValidate, sendResult } from '@tenantgate/http';
import type { UseCase } from '@tenantgate/application';

import type {
	AssignPermissionToRoleCommand,
	CreateRoleCommand,
	DeleteRoleCommand,
	PermissionAssignment,
	RemovePermissionFromRoleCommand,
	UpdateRoleCommand,
} from '../application/index.js';
import type { Role } from '../domain/index.js';
import type { PermissionStore, RoleStore } from '../infrastructure/persistence/index.js';
import { toPermissionResponse, toRoleResponse } from './responses.js';

const ScopeSchema = Type.Union([Type.Literal('organization'), Type.Literal('team')]);

const CreateRoleSchema = Type.Object({
	name: Type.String({ minLength: 1, maxLength: 255 }),
	slug: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	description: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
	scope: ScopeSchema,
	inheritsRoleId: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])),
});

const UpdateRoleSchema = Type.Object({
	name: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	slug: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	description: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
	inheritsRoleId: Type.Optional(Type.Union([Type.Integer({ minimum: 1 }), Type.Null()])),
});

const ListRolesQuerySchema = Type.Object({
	scope: Type.Optional(ScopeSchema),
});

export interface RolesRoutesDeps {
	readonly store: Pick<
		RoleStore & PermissionStore,
		'getRoleById' | 'getRoleBySlug' | 'listRoles' | 'listRolePermissions'
	>;
	readonly createRoleUseCase: UseCase<CreateRoleCommand, Role>;
	readonly updateRoleUseCase: UseCase<UpdateRoleCommand, Role>;
	readonly deleteRoleUseCase: UseCase<DeleteRoleCommand, Role>;
	readonly assignPermissionToRoleUseCase: UseCase<AssignPermissionToRoleCommand, PermissionAssignment>;
	readonly removePermissionFromRoleUseCase: UseCase<RemovePermissionFromRoleCommand, RemovePermissionFromRoleCommand>;
}

interface RoleParams {
	roleId: string;
}

interface RolePermissionParams {
	roleId: string;
	permissionId: string;
}

export async function registerRolesRoutes(fastify: FastifyInstance, deps: RolesRoutesDeps): Promise<void> {
	const {
		store,
		createRoleUseCase,
		updateRoleUseCase,
		deleteRoleUseCase,
		assignPermissionToRoleUseCase,
		removePermissionFromRoleUseCase,
	} = deps;
	const schema = { tags: ['Roles'] };

	// POST /rbac/roles - Create role
	fastify.post('/rbac/roles', { schema: { ...schema, summary: 'Create a role' } }, async (request, reply) => {
		const bodyResult = safeValidate(request.body, CreateRoleSchema);
		if (!bodyResult.success) {
			return badRequest(reply, bodyResult.error);
		}

		const result = await createRoleUseCase.execute(bodyResult.data, request.executionContext);
		return sendResult(reply, result, { successStatus: 201, transform: toRoleResponse });
	});

	// GET /rbac/roles - List roles, optionally of one scope
	fastify.get('/rbac/roles', { schema: { ...schema, summary: 'List roles' } }, async (request, reply) => {
		const queryResult = safeValidate(request.query, ListRolesQuerySchema);
		if (!queryResult.success) {
			return badRequest(reply, queryResult.error);
		}

		const roles = await store.listRoles(queryResult.data.scope, request.executionContext.signal);
		return jsonSuccess(reply, { roles: roles.map(toRoleResponse), total: roles.length });
	});

	// GET /rbac/roles/slug/:slug - Get role by slug
	fastify.get<{ Params: { slug: string } }>(
		'/rbac/roles/slug/:slug',
		{ schema: { ...schema, summary: 'Get a role by slug' } },
		async (request, reply) => {
			const role = await store.getRoleBySlug(request.params.slug, request.executionContext.signal);
			if (!role) {
				return notFound(reply, 'ROLE_NOT_FOUND', `Role with slug '${request.params.slug}' not found`);
			}
			return jsonSuccess(reply, toRoleResponse(role));
		},
	);

	// GET /rbac/roles/:roleId - Get role by id
	fastify.get<{ Params: RoleParams }>(
		'/rbac/roles/:roleId',
		{ schema: { ...schema, summary: 'Get a role' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			if (roleId === null) {
				return badRequest(reply, 'roleId must be a positive integer');
			}

			const role = await store.getRoleById(roleId, request.executionContext.signal);
			if (!role) {
				return notFound(reply, 'ROLE_NOT_FOUND', 'Role not found');
			}
			return jsonSuccess(reply, toRoleResponse(role));
		},
	);

	// PUT /rbac/roles/:roleId - Update role
	fastify.put<{ Params: RoleParams }>(
		'/rbac/roles/:roleId',
		{ schema: { ...schema, summary: 'Update a role' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			if (roleId === null) {
				return badRequest(reply, 'roleId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, UpdateRoleSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await updateRoleUseCase.execute({ roleId, ...bodyResult.data }, request.executionContext);
			return sendResult(reply, result, { transform: toRoleResponse });
		},
	);

	// DELETE /rbac/roles/:roleId - Delete role
	fastify.delete<{ Params: RoleParams }>(
		'/rbac/roles/:roleId',
		{ schema: { ...schema, summary: 'Delete a role that nothing references' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			if (roleId === null) {
				return badRequest(reply, 'roleId must be a positive integer');
			}

			const result = await deleteRoleUseCase.execute({ roleId }, request.executionContext);
			return sendResult(reply, result, { transform: toRoleResponse });
		},
	);

	// GET /rbac/roles/:roleId/permissions - Direct permissions of a role
	fastify.get<{ Params: RoleParams }>(
		'/rbac/roles/:roleId/permissions',
		{ schema: { ...schema, summary: 'List the direct permissions of a role' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			if (roleId === null) {
				return badRequest(reply, 'roleId must be a positive integer');
			}

			const { signal } = request.executionContext;
			const role = await store.getRoleById(roleId, signal);
			if (!role) {
				return notFound(reply, 'ROLE_NOT_FOUND', 'Role not found');
			}
			const permissions = await store.listRolePermissions(roleId, signal);
			return jsonSuccess(reply, { permissions: permissions.map(toPermissionResponse) });
		},
	);

	// POST /rbac/roles/:roleId/permissions/:permissionId - Grant a permission
	fastify.post<{ Params: RolePermissionParams }>(
		'/rbac/roles/:roleId/permissions/:permissionId',
		{ schema: { ...schema, summary: 'Assign a permission to a role' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			const permissionId = parseIdParam(request.params.permissionId);
			if (roleId === null || permissionId === null) {
				return badRequest(reply, 'roleId and permissionId must be positive integers');
			}

			const result = await assignPermissionToRoleUseCase.execute({ roleId, permissionId }, request.executionContext);
			return sendResult(reply, result);
		},
	);

	// DELETE /rbac/roles/:roleId/permissions/:permissionId - Revoke a permission
	fastify.delete<{ Params: RolePermissionParams }>(
		'/rbac/roles/:roleId/permissions/:permissionId',
		{ schema: { ...schema, summary: 'Remove a permission from a role' } },
		async (request, reply) => {
			const roleId = parseIdParam(request.params.roleId);
			const permissionId = parseIdParam(request.params.permissionId);
			if (roleId === null || permissionId === null) {
				return badRequest(reply, 'roleId and permissionId must be positive integers');
			}

			const result = await removePermissionFromRoleUseCase.execute(
				{ roleId, permissionId },
				request.executionContext,
			);
			return sendResult(reply, result);
		},
	);
}
