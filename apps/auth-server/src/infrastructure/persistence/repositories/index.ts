/**
 * Repositories
 */

export { createRoleRepository, recordToRole } from './role-repository.js';
export { createPermissionRepository, recordToPermission } from './permission-repository.js';
export { createMembershipRepository } from './membership-repository.js';
export { createDirectoryRepository } from './directory-repository.js';
export { createRefreshTokenRepository } from './refresh-token-repository.js';
