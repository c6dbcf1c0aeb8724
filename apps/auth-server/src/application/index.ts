/**
 * Application Layer
 *
 * Administrative and authentication use cases.
 */

export * from './refresh-permissions.js';
export * from './role/index.js';
export * from './permission/index.js';
export * from './membership/index.js';
export * from './auth/index.js';
