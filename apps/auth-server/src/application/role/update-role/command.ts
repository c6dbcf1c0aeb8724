/**
 * Update Role Command
 */

import type { Command } from '@tenantgate/application';

/**
 * Omitted fields are left unchanged.
 */
export interface UpdateRoleCommand extends Command {
	readonly roleId: number;
	readonly name?: string | undefined;
	readonly slug?: string | undefined;
	readonly description?: string | null | undefined;
	/** null clears the parent */
	readonly inheritsRoleId?: number | null | undefined;
}
