/**
 * Authorization Hook
 *
 * Fastify `onRequest` hook running {@link authorizeRequest} ahead of every
 * route. Denials are answered directly; on allow the principal is attached to
 * the request and to its execution context.
 */

import type { FastifyPluginAsync, onRequestAsyncHookHandler } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext } from '@tenantgate/domain-core';
import {
	authorizeRequest,
	type AuthenticatedPrincipal,
	type AuthorizationDecision,
	type AuthorizeRequestDeps,
} from './authorize-request.js';

declare module 'fastify' {
	interface FastifyRequest {
		/** Set by the authorization hook; null on public paths */
		principal: AuthenticatedPrincipal | null;
		authorizationDecision: AuthorizationDecision | null;
	}
}

/**
 * @example
 * ```typescript
 * fastify.addHook('onRequest', authorizationHook({ tokens, store, permissionCache, logger }));
 * ```
 */
export function authorizationHook(deps: AuthorizeRequestDeps): onRequestAsyncHookHandler {
	return async (request, reply) => {
		const decision = await authorizeRequest(deps, {
			method: request.method,
			url: request.url,
			authorization: request.headers.authorization,
			signal: request.executionContext.signal,
		});
		request.authorizationDecision = decision;

		if (decision.outcome === 'deny') {
			return reply.status(decision.status).send({ code: decision.code, message: decision.message });
		}

		request.principal = decision.principal;
		if (decision.principal) {
			request.executionContext = ExecutionContext.withPrincipal(
				request.executionContext,
				String(decision.principal.user.id),
			);
		}
	};
}

const authorizationPluginAsync: FastifyPluginAsync<AuthorizeRequestDeps> = async (fastify, deps) => {
	fastify.decorateRequest('principal', null);
	fastify.decorateRequest('authorizationDecision', null);
	fastify.addHook('onRequest', authorizationHook(deps));
};

export const authorizationPlugin = fp(authorizationPluginAsync, {
	name: '@tenantgate/authorization',
	fastify: '5.x',
	dependencies: ['@tenantgate/execution-context'],
});
