/**
 * @tenantgate/application
 *
 * Application layer patterns:
 * - Command types for write operation inputs
 * - UseCase interface for business operations
 * - Validation utilities returning Result
 */

// Command types
export { type Command, type EntityCommand } from './command.js';

// UseCase interfaces
export { type UseCase, type UseCaseCommand, type UseCaseResult, type UseCaseFactory } from './use-case.js';

// Validation utilities
export {
	validateRequired,
	validateFormat,
	validateMaxLength,
	validatePositiveId,
	validateOneOf,
	validateEmail,
	validateAll,
} from './validation.js';

// Re-export commonly used types from domain-core for convenience
export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
} from '@tenantgate/domain-core';
