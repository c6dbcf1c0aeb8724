/**
 * Remove Permission From Role Command
 */

import type { Command } from '@tenantgate/application';

export interface RemovePermissionFromRoleCommand extends Command {
	readonly roleId: number;
	readonly permissionId: number;
}
