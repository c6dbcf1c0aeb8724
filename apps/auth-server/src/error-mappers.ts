/**
 * Error mappers for failures that escape the use cases.
 *
 * Every one of them is a 500 with the generic message; the full error is
 * logged by the error handler.
 */

import { DeadlineExceededError } from '@tenantgate/domain-core';
import { INTERNAL_ERROR_BODY, type ErrorMapper } from '@tenantgate/http';
import { DatabaseError } from '@tenantgate/persistence';

import { TokenSigningError } from './auth/index.js';
import { InheritanceDepthExceededError } from './authorization/index.js';

function internal(code: string): ReturnType<ErrorMapper['toResponse']> {
	return { status: 500, body: { code, message: INTERNAL_ERROR_BODY.message } };
}

export function createAuthServerErrorMappers(): ErrorMapper[] {
	return [
		{
			canHandle: (e) => e instanceof DeadlineExceededError,
			toResponse: () => internal('DEADLINE_EXCEEDED'),
		},
		{
			canHandle: (e) => e instanceof DatabaseError,
			toResponse: () => internal('DATABASE_ERROR'),
		},
		{
			canHandle: (e) => e instanceof InheritanceDepthExceededError,
			toResponse: () => internal('INHERITANCE_DEPTH_EXCEEDED'),
		},
		{
			canHandle: (e) => e instanceof TokenSigningError,
			toResponse: () => internal('TOKEN_SIGNING_FAILED'),
		},
	];
}
