/**
 * Database schema
 */

export * from './users.js';
export * from './organizations.js';
export * from './roles.js';
export * from './memberships.js';
export * from './refresh-tokens.js';
