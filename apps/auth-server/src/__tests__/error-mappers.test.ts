import { describe, it, expect } from 'vitest';
import { DeadlineExceededError } from '@tenantgate/domain-core';
import { DatabaseError } from '@tenantgate/persistence';

import { InheritanceDepthExceededError } from '../authorization/index.js';
import { createAuthServerErrorMappers } from '../error-mappers.js';

function responseFor(error: Error) {
	const mapper = createAuthServerErrorMappers().find((candidate) => candidate.canHandle(error));
	return mapper?.toResponse(error);
}

describe('createAuthServerErrorMappers', () => {
	it('should name a passed deadline', () => {
		expect(responseFor(new DeadlineExceededError())).toEqual({
			status: 500,
			body: { code: 'DEADLINE_EXCEEDED', message: 'An unexpected error occurred' },
		});
	});

	it('should name store and resolver failures without their details', () => {
		expect(responseFor(new DatabaseError('roles.create', new Error('connection reset')))).toEqual({
			status: 500,
			body: { code: 'DATABASE_ERROR', message: 'An unexpected error occurred' },
		});
		expect(responseFor(new InheritanceDepthExceededError('Admin', 'organization', 16))?.body.code).toBe(
			'INHERITANCE_DEPTH_EXCEEDED',
		);
	});

	it('should leave other errors to the generic handler', () => {
		expect(responseFor(new Error('boom'))).toBeUndefined();
	});
});
