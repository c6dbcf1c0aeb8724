/**
 * Response Utilities
 *
 * Utilities for mapping Result types to HTTP responses and
 * handling errors consistently with Fastify.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@tenantgate/domain-core';
import type { ErrorResponse } from './types.js';
import { INTERNAL_ERROR_BODY } from './error-handler.js';

/**
 * Get HTTP status code for a use case error.
 */
export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

/**
 * Convert a use case error to an error response.
 * Internal errors only expose their code; the message is replaced.
 */
export function toErrorResponse(error: UseCaseError): ErrorResponse {
	if (error.type === 'internal') {
		return { code: error.code, message: INTERNAL_ERROR_BODY.message };
	}
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

/**
 * Options for sending a result as HTTP response.
 */
export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * @example
 * ```typescript
 * fastify.post('/rbac/roles', async (request, reply) => {
 *     const result = await createRoleUseCase.execute(command, request.executionContext);
 *     return sendResult(reply, result, { successStatus: 201, transform: toRoleResponse });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	if (result.error.type === 'internal') {
		reply.log.error({ code: result.error.code, details: result.error.details }, result.error.message);
	}
	return reply.status(getErrorStatus(result.error)).send(toErrorResponse(result.error));
}

/**
 * Send a use case error directly.
 */
export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	return sendResult(reply, Result.failure(error));
}

/**
 * Create a success (200) JSON response.
 */
export function jsonSuccess<T>(reply: FastifyReply, data: T): FastifyReply {
	return reply.status(200).send(data);
}

/**
 * Create a created (201) JSON response.
 */
export function jsonCreated<T>(reply: FastifyReply, data: T): FastifyReply {
	return reply.status(201).send(data);
}

/**
 * Create a no content (204) response.
 */
export function noContent(reply: FastifyReply): FastifyReply {
	return reply.status(204).send();
}

/**
 * Create an error JSON response.
 */
export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

/**
 * Create a not found (404) error response.
 */
export function notFound(reply: FastifyReply, code: string, message: string): FastifyReply {
	return jsonError(reply, 404, code, message);
}

/**
 * Create a bad request (400) error response.
 */
export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'VALIDATION_ERROR', message, details);
}
