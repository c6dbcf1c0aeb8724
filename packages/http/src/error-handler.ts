/**
 * Error Handler
 *
 * Global error handler plugin for Fastify applications.
 * Catches exceptions and maps them to appropriate HTTP responses.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import { DeadlineExceededError } from '@tenantgate/domain-core';
import type { ErrorResponse } from './types.js';

/**
 * Configuration for the error handler.
 */
export interface ErrorHandlerConfig {
	/** Custom error mappers, tried in order before the generic 500 */
	readonly mappers?: ErrorMapper[];
}

/**
 * Custom error mapper function.
 */
export interface ErrorMapper {
	/** Check if this mapper handles the error */
	canHandle: (error: Error) => boolean;
	/** Map the error to an HTTP response */
	toResponse: (error: Error) => { status: number; body: ErrorResponse };
}

/** Body sent for every unmapped failure. */
export const INTERNAL_ERROR_BODY: ErrorResponse = {
	code: 'INTERNAL_ERROR',
	message: 'An unexpected error occurred',
};

function isFastifyError(error: Error): error is FastifyError {
	return 'code' in error && typeof error.code === 'string';
}

/**
 * Create an error handler plugin for Fastify.
 *
 * Handles:
 * - Custom errors (via registered mappers)
 * - Fastify client errors (statusCode < 500)
 * - Unknown errors (logged in full, answered with a generic 500)
 *
 * @example
 * ```typescript
 * await fastify.register(errorHandlerPlugin, {
 *     mappers: [
 *         ...createCommonErrorMappers(),
 *         {
 *             canHandle: (e) => e instanceof DatabaseError,
 *             toResponse: () => ({ status: 500, body: { code: 'DATABASE_ERROR', message: 'An unexpected error occurred' } }),
 *         },
 *     ],
 * });
 * ```
 */
const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);

				if (status >= 500) {
					log.error({ err: error, status, code: body.code }, 'Mapped error');
				}

				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;
		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error({ err: error }, 'Unhandled error');
		return reply.status(500).send(INTERNAL_ERROR_BODY);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@tenantgate/error-handler',
	fastify: '5.x',
});

/**
 * Create common error mappers.
 */
export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		// Schema validation errors (from Fastify's AJV integration)
		{
			canHandle: (e) => isFastifyError(e) && e.code === 'FST_ERR_VALIDATION',
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'VALIDATION_ERROR',
					message: 'Request validation failed',
					...(isFastifyError(e) && e.validation ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		// JSON parse errors
		{
			canHandle: (e) =>
				(isFastifyError(e) && e.code === 'FST_ERR_CTP_INVALID_JSON_BODY') ||
				(e instanceof SyntaxError && e.message.includes('JSON')),
			toResponse: () => ({
				status: 400,
				body: {
					code: 'INVALID_JSON',
					message: 'Invalid JSON in request body',
				},
			}),
		},
		// Request deadline or client disconnect
		{
			canHandle: (e) => e instanceof DeadlineExceededError,
			toResponse: () => ({
				status: 503,
				body: {
					code: 'DEADLINE_EXCEEDED',
					message: 'The request could not be completed in time',
				},
			}),
		},
	];
}

/**
 * Create the standard error handler plugin options with common mappers.
 */
export function createStandardErrorHandlerOptions(extraMappers: ErrorMapper[] = []): ErrorHandlerConfig {
	return {
		mappers: [...createCommonErrorMappers(), ...extraMappers],
	};
}
