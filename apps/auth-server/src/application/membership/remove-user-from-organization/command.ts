/**
 * Remove User From Organization Command
 */

import type { Command } from '@tenantgate/application';

export interface RemoveUserFromOrganizationCommand extends Command {
	readonly organizationId: number;
	readonly userEmail: string;
}
