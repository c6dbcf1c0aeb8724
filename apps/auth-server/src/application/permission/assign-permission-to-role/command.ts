/**
 * Assign Permission To Role Command
 */

import type { Command } from '@tenantgate/application';

export interface AssignPermissionToRoleCommand extends Command {
	readonly roleId: number;
	readonly permissionId: number;
}
