/**
 * HTTP Layer Types
 *
 * Shared response shapes and the Fastify request augmentation.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ExecutionContext } from '@tenantgate/domain-core';

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

/**
 * Configuration for the execution context plugin.
 */
export interface ExecutionContextPluginOptions {
	/** Per-request deadline in milliseconds (default: none) */
	readonly requestTimeoutMs?: number | undefined;
}

declare module 'fastify' {
	interface FastifyRequest {
		/** Execution context for use case calls */
		executionContext: ExecutionContext;
	}
}

export type { FastifyRequest, FastifyReply };
