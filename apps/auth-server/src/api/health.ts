/**
 * Health API
 */

import type { FastifyInstance } from 'fastify';
import { jsonSuccess } from '@tenantgate/http';

import type { PermissionCache } from '../authorization/index.js';

export interface HealthRoutesDeps {
	readonly permissionCache: Pick<PermissionCache, 'snapshot'>;
}

export async function registerHealthRoutes(fastify: FastifyInstance, deps: HealthRoutesDeps): Promise<void> {
	// GET /health - Liveness, with the permission table currently in use
	fastify.get('/health', { schema: { tags: ['Health'], summary: 'Service health' } }, async (_request, reply) => {
		return jsonSuccess(reply, { status: 'UP', permissionCache: deps.permissionCache.snapshot().source });
	});
}
