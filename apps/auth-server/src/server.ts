/**
 * Server assembly
 *
 * Builds the Fastify instance: logging, CORS, OpenAPI docs, execution
 * context, error handling, the authorization hook and every route module.
 * Nothing here touches the environment or the database, so tests build the
 * same server over in-process fakes.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import {
	createFastifyLoggerOptions,
	createStandardErrorHandlerOptions,
	errorHandlerPlugin,
	executionContextPlugin,
} from '@tenantgate/http';
import type { LoggerConfig } from '@tenantgate/logging';

import { registerApiRoutes, type ApiRoutesDeps } from './api/index.js';
import { authorizationPlugin, type AuthorizeRequestDeps } from './authorization/index.js';
import { createAuthServerErrorMappers } from './error-mappers.js';

export interface ServerDeps extends ApiRoutesDeps {
	readonly authorization: AuthorizeRequestDeps;
}

export interface ServerOptions {
	/** Request logging; disabled when omitted */
	readonly logging?: LoggerConfig | undefined;
	readonly requestTimeoutMs?: number | undefined;
	/** Allowed CORS origins; cross-origin requests are refused when empty */
	readonly corsOrigins?: readonly string[] | undefined;
	/** Serve the OpenAPI document and UI under /docs (default: true) */
	readonly docs?: boolean | undefined;
}

type LoggingOptions = Pick<FastifyServerOptions, 'logger' | 'genReqId' | 'requestIdHeader' | 'requestIdLogLabel'>;

export async function buildServer(deps: ServerDeps, options: ServerOptions = {}): Promise<FastifyInstance> {
	const loggingOptions: LoggingOptions = options.logging
		? createFastifyLoggerOptions(options.logging)
		: { logger: false };
	const fastify = Fastify(loggingOptions);

	await fastify.register(cors, {
		origin: options.corsOrigins && options.corsOrigins.length > 0 ? [...options.corsOrigins] : false,
	});

	if (options.docs ?? true) {
		await fastify.register(swagger, {
			openapi: {
				openapi: '3.1.0',
				info: {
					title: 'Tenantgate Auth API',
					version: '0.1.0',
					description: 'Authentication, context switching and role-based access control.',
				},
				servers: [{ url: '/' }],
				components: {
					securitySchemes: {
						bearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
					},
				},
				security: [{ bearerAuth: [] }],
			},
		});
		await fastify.register(swaggerUi, {
			routePrefix: '/docs',
			uiConfig: { docExpansion: 'list', deepLinking: true },
		});
	}

	await fastify.register(executionContextPlugin, { requestTimeoutMs: options.requestTimeoutMs });
	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions(createAuthServerErrorMappers()));
	await fastify.register(authorizationPlugin, deps.authorization);

	await registerApiRoutes(fastify, deps);

	return fastify;
}
