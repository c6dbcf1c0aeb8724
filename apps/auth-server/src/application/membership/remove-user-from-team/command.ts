/**
 * Remove User From Team Command
 */

import type { Command } from '@tenantgate/application';

export interface RemoveUserFromTeamCommand extends Command {
	readonly teamId: number;
	readonly userEmail: string;
}
