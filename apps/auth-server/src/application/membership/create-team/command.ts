/**
 * Create Team Command
 */

import type { Command } from '@tenantgate/application';

export interface CreateTeamCommand extends Command {
	readonly organizationId: number;
	readonly name: string;
	readonly description?: string | null | undefined;
}
