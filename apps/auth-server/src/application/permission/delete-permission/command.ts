/**
 * Delete Permission Command
 */

import type { EntityCommand } from '@tenantgate/application';

export type DeletePermissionCommand = EntityCommand<object, 'permissionId'>;
