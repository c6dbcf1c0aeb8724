import { Result, UseCaseError } from '@tenantgate/application';
import { tryParsePermissionName } from '../../domain/index.js';

/**
 * Check a permission name against the grammar. Returns the trimmed name.
 */
export function validatePermissionName(name: string): Result<string> {
	const trimmed = name.trim();
	const parsed = tryParsePermissionName(trimmed);
	if (parsed instanceof Error) {
		return Result.failure(
			UseCaseError.validation('INVALID_PERMISSION_NAME', parsed.message, { name: trimmed, reason: parsed.reason }),
		);
	}
	return Result.success(trimmed);
}

/**
 * Default slug source for a permission: its name with `:` and `,` read as
 * word breaks, so `teams:create:POST` gives `teams-create-post`.
 */
export function permissionSlugSource(name: string): string {
	return name.replace(/[:,]/g, ' ');
}
