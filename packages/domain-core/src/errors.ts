/**
 * Use Case Error Types
 *
 * Closed error union for use case failures. Errors are categorized by type
 * so the HTTP layer can map them to a status code without inspecting messages.
 *
 * HTTP Status Mapping:
 * - ValidationError → 400 Bad Request
 * - UnauthorizedError → 401 Unauthorized
 * - ForbiddenError → 403 Forbidden
 * - NotFoundError → 404 Not Found
 * - ConflictError → 409 Conflict
 * - BusinessRuleViolation → 409 Conflict
 * - InternalError → 500 Internal Server Error
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Input validation failed (missing required field, malformed slug, etc.)
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

/**
 * Referenced entity is absent. The `code` tells callers which one.
 */
export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Duplicate name/slug, already-assigned permission, entity still in use.
 */
export interface ConflictError extends UseCaseErrorBase {
	readonly type: 'conflict';
}

/**
 * Business rule violation (entity in wrong state, constraint violated, etc.)
 */
export interface BusinessRuleViolation extends UseCaseErrorBase {
	readonly type: 'business_rule';
}

/**
 * Missing, invalid or expired credential.
 */
export interface UnauthorizedError extends UseCaseErrorBase {
	readonly type: 'unauthorized';
}

/**
 * Authenticated, but not allowed.
 */
export interface ForbiddenError extends UseCaseErrorBase {
	readonly type: 'forbidden';
}

/**
 * Unexpected failure. Only the code and a generic message reach the client.
 */
export interface InternalError extends UseCaseErrorBase {
	readonly type: 'internal';
}

/**
 * Union type for all use case errors.
 */
export type UseCaseError =
	| ValidationError
	| NotFoundError
	| ConflictError
	| BusinessRuleViolation
	| UnauthorizedError
	| ForbiddenError
	| InternalError;

export type UseCaseErrorType = UseCaseError['type'];

const ERROR_TYPES: ReadonlySet<string> = new Set<UseCaseErrorType>([
	'validation',
	'not_found',
	'conflict',
	'business_rule',
	'unauthorized',
	'forbidden',
	'internal',
]);

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * Create a validation error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.validation('INVALID_SLUG', 'Slug cannot be empty', { name: '!!!' })
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	/**
	 * Create a not found error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.notFound('ROLE_NOT_FOUND', 'Role not found', { roleId: 3 })
	 * ```
	 */
	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	/**
	 * Create a conflict error.
	 *
	 * @example
	 * ```typescript
	 * UseCaseError.conflict('PERMISSION_IN_USE', 'Permission is assigned to one or more roles', { permissionId: 2 })
	 * ```
	 */
	conflict(code: string, message: string, details: Record<string, unknown> = {}): ConflictError {
		return { type: 'conflict', code, message, details };
	},

	/**
	 * Create a business rule violation error.
	 */
	businessRule(code: string, message: string, details: Record<string, unknown> = {}): BusinessRuleViolation {
		return { type: 'business_rule', code, message, details };
	},

	unauthorized(code: string, message: string, details: Record<string, unknown> = {}): UnauthorizedError {
		return { type: 'unauthorized', code, message, details };
	},

	forbidden(code: string, message: string, details: Record<string, unknown> = {}): ForbiddenError {
		return { type: 'forbidden', code, message, details };
	},

	/**
	 * Create an internal error. Keep `details` free of stack traces and query text.
	 */
	internal(code: string, message: string, details: Record<string, unknown> = {}): InternalError {
		return { type: 'internal', code, message, details };
	},

	/**
	 * Get the HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'validation':
				return 400;
			case 'unauthorized':
				return 401;
			case 'forbidden':
				return 403;
			case 'not_found':
				return 404;
			case 'conflict':
			case 'business_rule':
				return 409;
			case 'internal':
				return 500;
		}
	},

	/**
	 * Check if an unknown value is a UseCaseError.
	 */
	isUseCaseError(value: unknown): value is UseCaseError {
		if (typeof value !== 'object' || value === null) return false;
		if (!('type' in value) || !('code' in value) || !('message' in value) || !('details' in value)) {
			return false;
		}
		return (
			typeof value.type === 'string' &&
			ERROR_TYPES.has(value.type) &&
			typeof value.code === 'string' &&
			typeof value.message === 'string' &&
			typeof value.details === 'object' &&
			value.details !== null
		);
	},
};
