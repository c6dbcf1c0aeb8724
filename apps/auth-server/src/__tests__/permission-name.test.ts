import { describe, it, expect } from 'vitest';
import { Result } from '@tenantgate/application';

import {
	InvalidPermissionNameError,
	createSlug,
	generateSlug,
	parsePermissionName,
	tryParsePermissionName,
} from '../domain/index.js';
import { permissionSlugSource, validatePermissionName } from '../application/index.js';

describe('parsePermissionName', () => {
	it('should map resource:methods to the resource route', () => {
		expect(parsePermissionName('teams:GET')).toEqual({ route: '/rbac/teams', methods: ['GET'] });
	});

	it('should map resource:action:methods to the action route', () => {
		expect(parsePermissionName('teams:create:POST')).toEqual({ route: '/rbac/teams/create', methods: ['POST'] });
	});

	it('should normalise case and order methods canonically', () => {
		expect(parsePermissionName('Teams:Assign-User:post, get')).toEqual({
			route: '/rbac/teams/assign-user',
			methods: ['GET', 'POST'],
		});
	});

	it('should grant every method on the wildcard for super_admin', () => {
		expect(parsePermissionName('super_admin')).toEqual({
			route: '*',
			methods: ['GET', 'POST', 'PUT', 'DELETE', 'PATCH'],
		});
	});

	it('should reject a name without methods', () => {
		expect(() => parsePermissionName('teams')).toThrow(InvalidPermissionNameError);
	});

	it('should reject too many segments', () => {
		expect(() => parsePermissionName('a:b:c:GET')).toThrow(
			'Invalid permission name "a:b:c:GET": expected resource:methods or resource:action:methods',
		);
	});

	it('should reject an unknown method', () => {
		expect(() => parsePermissionName('teams:FETCH')).toThrow('unknown method "FETCH"');
	});

	it('should reject characters outside the segment alphabet', () => {
		expect(() => parsePermissionName('team s:GET')).toThrow('resource must match [a-z0-9_-]+');
		expect(() => parsePermissionName('teams:cre.ate:GET')).toThrow('action must match [a-z0-9_-]+');
	});

	it('should return the error instead of throwing from tryParsePermissionName', () => {
		const parsed = tryParsePermissionName('teams:');
		expect(parsed).toBeInstanceOf(InvalidPermissionNameError);
		if (parsed instanceof InvalidPermissionNameError) {
			expect(parsed.permissionName).toBe('teams:');
			expect(parsed.reason).toBe('unknown method ""');
		}
	});
});

describe('validatePermissionName', () => {
	it('should return the trimmed name', () => {
		const result = validatePermissionName('  teams:GET ');
		expect(Result.isSuccess(result)).toBe(true);
		if (Result.isSuccess(result)) {
			expect(result.value).toBe('teams:GET');
		}
	});

	it('should fail with INVALID_PERMISSION_NAME', () => {
		const result = validatePermissionName('teams');
		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.type).toBe('validation');
			expect(result.error.code).toBe('INVALID_PERMISSION_NAME');
			expect(result.error.details).toEqual({
				name: 'teams',
				reason: 'expected resource:methods or resource:action:methods',
			});
		}
	});
});

describe('slugs', () => {
	it('should lower-case and hyphenate', () => {
		expect(generateSlug('Team Lead')).toBe('team-lead');
		expect(generateSlug('  Org -- Admin!  ')).toBe('org-admin');
	});

	it('should derive a permission slug from its name', () => {
		expect(generateSlug(permissionSlugSource('teams:create:POST'))).toBe('teams-create-post');
		expect(generateSlug(permissionSlugSource('teams:assign-user:GET,POST'))).toBe('teams-assign-user-get-post');
	});

	it('should fail with INVALID_SLUG when nothing is left', () => {
		const result = createSlug('!!!');
		expect(Result.isFailure(result)).toBe(true);
		if (Result.isFailure(result)) {
			expect(result.error.code).toBe('INVALID_SLUG');
			expect(result.error.details).toEqual({ field: 'slug', value: '!!!' });
		}
	});
});
