/**
 * Execution Context Plugin
 *
 * Creates an ExecutionContext for every request. The context's correlation id
 * is the Fastify request id, and its signal aborts when the request deadline
 * passes or the client disconnects before the response is written.
 */

import type { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext } from '@tenantgate/domain-core';
import type { ExecutionContextPluginOptions } from '../types.js';

/**
 * @example
 * ```typescript
 * await fastify.register(executionContextPlugin, { requestTimeoutMs: env.REQUEST_TIMEOUT_MS });
 *
 * fastify.post('/rbac/roles', async (request, reply) => {
 *     const result = await createRoleUseCase.execute(command, request.executionContext);
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */
const executionContextPluginAsync: FastifyPluginAsync<ExecutionContextPluginOptions> = async (fastify, opts) => {
	fastify.decorateRequest('executionContext', {
		getter() {
			return (this as unknown as { _executionContext: ExecutionContext })._executionContext;
		},
		setter(value: ExecutionContext) {
			(this as unknown as { _executionContext: ExecutionContext })._executionContext = value;
		},
	});

	fastify.addHook('onRequest', async (request, reply) => {
		const disconnect = new AbortController();
		reply.raw.once('close', () => {
			if (!reply.raw.writableFinished) {
				disconnect.abort();
			}
		});

		request.executionContext = ExecutionContext.create({
			correlationId: request.id,
			timeoutMs: opts.requestTimeoutMs,
			signal: disconnect.signal,
		});
	});
};

export const executionContextPlugin = fp(executionContextPluginAsync, {
	name: '@tenantgate/execution-context',
	fastify: '5.x',
});
