/**
 * @tenantgate/http
 *
 * HTTP layer utilities on Fastify:
 * - Execution context plugin (correlation id, request deadline)
 * - Result to HTTP response mapping
 * - Error handler plugin with pluggable mappers
 * - TypeBox schema utilities
 * - Pino logger options for Fastify
 *
 * @example
 * ```typescript
 * import Fastify from 'fastify';
 * import {
 *     executionContextPlugin,
 *     errorHandlerPlugin,
 *     createStandardErrorHandlerOptions,
 *     createFastifyLoggerOptions,
 *     sendResult,
 * } from '@tenantgate/http';
 *
 * const fastify = Fastify({ ...createFastifyLoggerOptions({ level: 'info', serviceName: 'auth-server' }) });
 * await fastify.register(executionContextPlugin, { requestTimeoutMs: 10_000 });
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */

// Types
export { type ErrorResponse, type ExecutionContextPluginOptions, type FastifyRequest, type FastifyReply } from './types.js';

// Plugins
export { executionContextPlugin } from './plugins/index.js';

// Logging
export { createFastifyLoggerOptions, REQUEST_ID_HEADER } from './logging.js';

// Bearer credentials
export { extractBearerToken } from './auth-header.js';

// Response utilities
export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	sendError,
	jsonSuccess,
	jsonCreated,
	noContent,
	jsonError,
	notFound,
	badRequest,
	type SendResultOptions,
} from './response.js';

// Error handler
export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	INTERNAL_ERROR_BODY,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

// OpenAPI utilities
export {
	CommonSchemas,
	ErrorResponseSchema,
	ProtectedRouteErrors,
	type ErrorResponseType,
	safeValidate,
	parseIdParam,
	Type,
	Value,
	type Static,
	type TSchema,
	type TObject,
} from './openapi.js';
