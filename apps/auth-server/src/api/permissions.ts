/**
 * Permissions API
 *
 * Permission management and permission cache introspection. Super admin only,
 * like the roles API.
 */

import type { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import { badRequest, jsonSuccess, notFound, parseIdParam, safeValidate, sendResult } from '@tenantgate/http';
import type { UseCase } from '@tenantgate/application';

import type { CreatePermissionCommand, DeletePermissionCommand, UpdatePermissionCommand } from '../application/index.js';
import type { Permission } from '../domain/index.js';
import type { CacheSnapshot, PermissionCache, RoleEntry } from '../authorization/index.js';
import type { PermissionStore } from '../infrastructure/persistence/index.js';
import { toPermissionResponse } from './responses.js';

const ScopeSchema = Type.Union([Type.Literal('organization'), Type.Literal('team')]);

const CreatePermissionSchema = Type.Object({
	name: Type.String({ minLength: 1, maxLength: 255 }),
	slug: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	description: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
	scope: ScopeSchema,
});

const UpdatePermissionSchema = Type.Object({
	name: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	slug: Type.Optional(Type.String({ minLength: 1, maxLength: 255 })),
	description: Type.Optional(Type.Union([Type.String({ maxLength: 1000 }), Type.Null()])),
	scope: Type.Optional(ScopeSchema),
});

interface CacheSnapshotResponse {
	source: string;
	builtAt: string;
	scopes: Record<string, Record<string, RoleEntry>>;
}

function toCacheSnapshotResponse(snapshot: CacheSnapshot): CacheSnapshotResponse {
	const scopes: Record<string, Record<string, RoleEntry>> = {};
	for (const [scope, roles] of snapshot.scopes) {
		scopes[scope] = Object.fromEntries(roles);
	}
	return { source: snapshot.source, builtAt: snapshot.builtAt.toISOString(), scopes };
}

export interface PermissionsRoutesDeps {
	readonly store: Pick<PermissionStore, 'getPermissionById' | 'listPermissions'>;
	readonly permissionCache: Pick<PermissionCache, 'snapshot' | 'refresh'>;
	readonly createPermissionUseCase: UseCase<CreatePermissionCommand, Permission>;
	readonly updatePermissionUseCase: UseCase<UpdatePermissionCommand, Permission>;
	readonly deletePermissionUseCase: UseCase<DeletePermissionCommand, Permission>;
}

interface PermissionParams {
	permissionId: string;
}

export async function registerPermissionsRoutes(fastify: FastifyInstance, deps: PermissionsRoutesDeps): Promise<void> {
	const { store, permissionCache, createPermissionUseCase, updatePermissionUseCase, deletePermissionUseCase } = deps;
	const schema = { tags: ['Permissions'] };

	// POST /rbac/permissions - Create permission
	fastify.post(
		'/rbac/permissions',
		{ schema: { ...schema, summary: 'Create a permission' } },
		async (request, reply) => {
			const bodyResult = safeValidate(request.body, CreatePermissionSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await createPermissionUseCase.execute(bodyResult.data, request.executionContext);
			return sendResult(reply, result, { successStatus: 201, transform: toPermissionResponse });
		},
	);

	// GET /rbac/permissions - List permissions
	fastify.get('/rbac/permissions', { schema: { ...schema, summary: 'List permissions' } }, async (request, reply) => {
		const permissions = await store.listPermissions(request.executionContext.signal);
		return jsonSuccess(reply, { permissions: permissions.map(toPermissionResponse), total: permissions.length });
	});

	// GET /rbac/permissions/cache - Current permission cache snapshot
	fastify.get(
		'/rbac/permissions/cache',
		{ schema: { ...schema, summary: 'Inspect the permission cache' } },
		async (_request, reply) => {
			return jsonSuccess(reply, toCacheSnapshotResponse(permissionCache.snapshot()));
		},
	);

	// POST /rbac/permissions/cache/refresh - Rebuild the permission cache
	fastify.post(
		'/rbac/permissions/cache/refresh',
		{ schema: { ...schema, summary: 'Rebuild the permission cache from the database' } },
		async (_request, reply) => {
			const refreshed = await permissionCache.refresh();
			return jsonSuccess(reply, { refreshed, source: permissionCache.snapshot().source });
		},
	);

	// GET /rbac/permissions/:permissionId - Get permission
	fastify.get<{ Params: PermissionParams }>(
		'/rbac/permissions/:permissionId',
		{ schema: { ...schema, summary: 'Get a permission' } },
		async (request, reply) => {
			const permissionId = parseIdParam(request.params.permissionId);
			if (permissionId === null) {
				return badRequest(reply, 'permissionId must be a positive integer');
			}

			const permission = await store.getPermissionById(permissionId, request.executionContext.signal);
			if (!permission) {
				return notFound(reply, 'PERMISSION_NOT_FOUND', 'Permission not found');
			}
			return jsonSuccess(reply, toPermissionResponse(permission));
		},
	);

	// PUT /rbac/permissions/:permissionId - Update permission
	fastify.put<{ Params: PermissionParams }>(
		'/rbac/permissions/:permissionId',
		{ schema: { ...schema, summary: 'Update a permission' } },
		async (request, reply) => {
			const permissionId = parseIdParam(request.params.permissionId);
			if (permissionId === null) {
				return badRequest(reply, 'permissionId must be a positive integer');
			}

			const bodyResult = safeValidate(request.body, UpdatePermissionSchema);
			if (!bodyResult.success) {
				return badRequest(reply, bodyResult.error);
			}

			const result = await updatePermissionUseCase.execute(
				{ permissionId, ...bodyResult.data },
				request.executionContext,
			);
			return sendResult(reply, result, { transform: toPermissionResponse });
		},
	);

	// DELETE /rbac/permissions/:permissionId - Delete an unused permission
	fastify.delete<{ Params: PermissionParams }>(
		'/rbac/permissions/:permissionId',
		{ schema: { ...schema, summary: 'Delete a permission no role holds' } },
		async (request, reply) => {
			const permissionId = parseIdParam(request.params.permissionId);
			if (permissionId === null) {
				return badRequest(reply, 'permissionId must be a positive integer');
			}

			const result = await deletePermissionUseCase.execute({ permissionId }, request.executionContext);
			return sendResult(reply, result, { transform: toPermissionResponse });
		},
	);
}
