/**
 * Update Permission Command
 */

import type { Command } from '@tenantgate/application';

/**
 * Omitted fields are left unchanged.
 */
export interface UpdatePermissionCommand extends Command {
	readonly permissionId: number;
	readonly name?: string | undefined;
	readonly slug?: string | undefined;
	readonly description?: string | null | undefined;
	readonly scope?: string | undefined;
}
