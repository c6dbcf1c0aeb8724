import { describe, it, expect } from 'vitest';
import Fastify from 'fastify';
import { Result, UseCaseError } from '@tenantgate/domain-core';
import {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	sendError,
	jsonSuccess,
	jsonCreated,
	noContent,
	notFound,
	badRequest,
} from '../response.js';

describe('Response Utilities', () => {
	describe('getErrorStatus', () => {
		it('should follow the use case error mapping', () => {
			expect(getErrorStatus(UseCaseError.validation('CODE', 'message'))).toBe(400);
			expect(getErrorStatus(UseCaseError.conflict('CODE', 'message'))).toBe(409);
			expect(getErrorStatus(UseCaseError.forbidden('CODE', 'message'))).toBe(403);
		});
	});

	describe('toErrorResponse', () => {
		it('should create error response with details', () => {
			const error = UseCaseError.validation('INVALID_SLUG', 'Slug cannot be empty', { field: 'slug' });

			expect(toErrorResponse(error)).toEqual({
				code: 'INVALID_SLUG',
				message: 'Slug cannot be empty',
				details: { field: 'slug' },
			});
		});

		it('should omit empty details', () => {
			expect(toErrorResponse(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found'))).toEqual({
				code: 'ROLE_NOT_FOUND',
				message: 'Role not found',
			});
		});

		it('should hide internal error messages and details', () => {
			const error = UseCaseError.internal('DATABASE_ERROR', 'relation "roles" does not exist', { query: 'select' });

			expect(toErrorResponse(error)).toEqual({ code: 'DATABASE_ERROR', message: 'An unexpected error occurred' });
		});
	});

	describe('sendResult', () => {
		it('should send success with custom status and transform', async () => {
			const app = Fastify();
			app.get('/test', async (_request, reply) =>
				sendResult(reply, Result.success({ id: 7, name: 'Admin' }), {
					successStatus: 201,
					transform: (role) => ({ roleId: role.id }),
				}),
			);

			const res = await app.inject({ method: 'GET', url: '/test' });

			expect(res.statusCode).toBe(201);
			expect(res.json()).toEqual({ roleId: 7 });
		});

		it('should map failures to status and body', async () => {
			const app = Fastify();
			app.get('/test', async (_request, reply) =>
				sendError(reply, UseCaseError.conflict('PERMISSION_IN_USE', 'Permission is assigned to one or more roles')),
			);

			const res = await app.inject({ method: 'GET', url: '/test' });

			expect(res.statusCode).toBe(409);
			expect(res.json()).toEqual({
				code: 'PERMISSION_IN_USE',
				message: 'Permission is assigned to one or more roles',
			});
		});
	});

	describe('helpers', () => {
		it('should send created, no content and bad request responses', async () => {
			const app = Fastify();
			app.post('/created', async (_request, reply) => jsonCreated(reply, { id: 1 }));
			app.delete('/gone', async (_request, reply) => noContent(reply));
			app.post('/bad', async (_request, reply) => badRequest(reply, '/name: Expected string'));

			const created = await app.inject({ method: 'POST', url: '/created' });
			const gone = await app.inject({ method: 'DELETE', url: '/gone' });
			const bad = await app.inject({ method: 'POST', url: '/bad' });

			expect(created.statusCode).toBe(201);
			expect(gone.statusCode).toBe(204);
			expect(gone.body).toBe('');
			expect(bad.statusCode).toBe(400);
			expect(bad.json()).toEqual({ code: 'VALIDATION_ERROR', message: '/name: Expected string' });
		});

		it('should send success and not found responses', async () => {
			const app = Fastify();
			app.get('/ok', async (_request, reply) => jsonSuccess(reply, { status: 'UP' }));
			app.get('/missing', async (_request, reply) => notFound(reply, 'ROLE_NOT_FOUND', 'Role not found'));

			const ok = await app.inject({ method: 'GET', url: '/ok' });
			const missing = await app.inject({ method: 'GET', url: '/missing' });

			expect(ok.statusCode).toBe(200);
			expect(ok.json()).toEqual({ status: 'UP' });
			expect(missing.statusCode).toBe(404);
			expect(missing.json()).toEqual({ code: 'ROLE_NOT_FOUND', message: 'Role not found' });
		});
	});
});
