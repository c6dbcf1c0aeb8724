/**
 * Assign User To Team Command
 */

import type { Command } from '@tenantgate/application';

export interface AssignUserToTeamCommand extends Command {
	readonly teamId: number;
	readonly userEmail: string;
	/** Must be a team-scoped role */
	readonly roleId: number;
}
