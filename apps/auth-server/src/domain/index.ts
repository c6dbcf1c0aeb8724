/**
 * Domain Layer
 */

export * from './scope.js';
export * from './permission-name.js';
export * from './slug.js';
export * from './role.js';
export * from './permission.js';
export * from './directory.js';
export * from './membership.js';
export * from './refresh-token.js';
