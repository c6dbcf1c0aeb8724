import type { CacheScope } from '../domain/index.js';

/**
 * Raised when a role's inheritance chain is longer than the resolver allows,
 * which in practice means the chain is cyclic.
 */
export class InheritanceDepthExceededError extends Error {
	readonly roleName: string;
	readonly scope: CacheScope;
	readonly maxDepth: number;

	constructor(roleName: string, scope: CacheScope, maxDepth: number) {
		super(`Inheritance chain of role "${roleName}" in scope "${scope}" exceeds ${maxDepth} roles`);
		this.name = 'InheritanceDepthExceededError';
		this.roleName = roleName;
		this.scope = scope;
		this.maxDepth = maxDepth;
	}
}
