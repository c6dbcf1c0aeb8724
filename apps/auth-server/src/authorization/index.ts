/**
 * Authorization
 *
 * Permission cache, effective-permission resolution and the request pipeline.
 */

export * from './errors.js';
export * from './permission-cache.js';
export * from './effective-permissions.js';
export * from './route-scope.js';
export * from './authorize-request.js';
export * from './authorization-hook.js';
export { FALLBACK_PERMISSIONS } from './fallback-permissions.js';
