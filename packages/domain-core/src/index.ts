/**
 * @tenantgate/domain-core
 *
 * Core domain infrastructure shared by every tenantgate workspace:
 * - Result type for use case outcomes
 * - Use case error union with HTTP status mapping
 * - Execution context carrying principal, correlation id and cancellation
 *
 * @example
 * ```typescript
 * import { Result, UseCaseError, ExecutionContext } from '@tenantgate/domain-core';
 *
 * const ctx = ExecutionContext.create({ principalId: 'admin@example.com', timeoutMs: 5000 });
 *
 * if (!role) {
 *     return Result.failure(UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found'));
 * }
 * return Result.success(role);
 * ```
 */

// Error types
export {
	UseCaseError,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type ValidationError,
	type NotFoundError,
	type ConflictError,
	type BusinessRuleViolation,
	type UnauthorizedError,
	type ForbiddenError,
	type InternalError,
} from './errors.js';

// Result type
export { Result, isSuccess, isFailure, type Success, type Failure } from './result.js';

// Execution context
export {
	ExecutionContext,
	DeadlineExceededError,
	abortable,
	type CreateExecutionContextOptions,
} from './execution-context.js';
