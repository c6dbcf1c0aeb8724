import { Result, UseCaseError } from '@tenantgate/application';
import type { PermissionCache } from '../authorization/index.js';

/**
 * Run an RBAC write and keep the permission cache in step with it.
 *
 * Callers pass a write that does not carry the request's signal: once sent,
 * a statement may commit whether or not the caller is still waiting. When the
 * write throws the cache is rebuilt anyway before the error propagates, since
 * the failure may have come after the commit.
 */
export async function commitRbacChange<T>(
	permissionCache: Pick<PermissionCache, 'refresh'>,
	write: () => Promise<T>,
): Promise<T> {
	try {
		return await write();
	} catch (error) {
		await permissionCache.refresh();
		throw error;
	}
}

/**
 * Rebuild the permission cache after a committed RBAC change, then succeed
 * with `value`.
 *
 * The rebuild ignores the request's signal: a client that goes away must not
 * leave the cache behind the database.
 */
export async function refreshPermissions<T>(
	permissionCache: Pick<PermissionCache, 'refresh'>,
	value: T,
): Promise<Result<T>> {
	const refreshed = await permissionCache.refresh();
	if (!refreshed) {
		return Result.failure(
			UseCaseError.internal('CACHE_REFRESH_FAILED', 'Change saved but the permission cache could not be rebuilt'),
		);
	}
	return Result.success(value);
}
