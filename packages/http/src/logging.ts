/**
 * Fastify logging options.
 *
 * Fastify uses pino natively; this builds its logger options from the same
 * configuration as standalone loggers, plus request/response serializers that
 * keep headers (and so bearer tokens) out of the access log.
 */

import { randomUUID } from 'node:crypto';
import type { FastifyReply, FastifyRequest, FastifyServerOptions } from 'fastify';
import { buildLoggerOptions, type LoggerConfig } from '@tenantgate/logging';

/**
 * Header carrying an inbound request id.
 */
export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Create Fastify logger and request-id options.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({
 *     ...createFastifyLoggerOptions({ level: env.LOG_LEVEL, serviceName: 'auth-server' }),
 * });
 * ```
 */
export function createFastifyLoggerOptions(
	config: LoggerConfig,
): Pick<FastifyServerOptions, 'logger' | 'genReqId' | 'requestIdHeader' | 'requestIdLogLabel'> {
	return {
		logger: {
			...buildLoggerOptions(config),
			serializers: {
				req: (req: FastifyRequest) => ({
					method: req.method,
					url: req.url,
					requestId: req.id,
				}),
				res: (res: Pick<FastifyReply, 'statusCode'>) => ({ statusCode: res.statusCode }),
			},
		},
		requestIdHeader: REQUEST_ID_HEADER,
		requestIdLogLabel: 'requestId',
		genReqId: () => randomUUID(),
	};
}
