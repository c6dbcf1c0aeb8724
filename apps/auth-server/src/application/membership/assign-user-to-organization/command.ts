/**
 * Assign User To Organization Command
 */

import type { Command } from '@tenantgate/application';

export interface AssignUserToOrganizationCommand extends Command {
	readonly organizationId: number;
	readonly userEmail: string;
	/** Must be an organization-scoped role */
	readonly roleId: number;
}
