/**
 * Delete Role Command
 */

import type { EntityCommand } from '@tenantgate/application';

export type DeleteRoleCommand = EntityCommand<object, 'roleId'>;
