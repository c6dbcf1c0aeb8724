/**
 * Create Role Command
 */

import type { Command } from '@tenantgate/application';

export interface CreateRoleCommand extends Command {
	readonly name: string;
	/** Derived from the name when omitted */
	readonly slug?: string | undefined;
	readonly description?: string | null | undefined;
	readonly scope: string;
	/** Parent role; must have the same scope */
	readonly inheritsRoleId?: number | null | undefined;
}
