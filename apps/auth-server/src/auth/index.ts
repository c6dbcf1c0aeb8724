/**
 * Authentication: token signing, token service, context payloads, passwords.
 */

export * from './token/index.js';
export * from './context-payload.js';
export * from './token-service.js';
export * from './password-hasher.js';
