/**
 * Create Permission Command
 */

import type { Command } from '@tenantgate/application';

export interface CreatePermissionCommand extends Command {
	/** `resource:methods`, `resource:action:methods` or `super_admin` */
	readonly name: string;
	/** Derived from the name when omitted */
	readonly slug?: string | undefined;
	readonly description?: string | null | undefined;
	readonly scope: string;
}
