/**
 * Login Command
 */

import type { Command } from '@tenantgate/application';

export interface LoginCommand extends Command {
	readonly email: string;
	readonly password: string;
}
