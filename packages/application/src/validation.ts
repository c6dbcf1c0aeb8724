/**
 * Validation Utilities
 *
 * Helper functions for common validation patterns in use cases.
 * All validation functions return Result types for consistent error handling.
 *
 * @example
 * ```typescript
 * const nameResult = validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD');
 * if (Result.isFailure(nameResult)) return nameResult;
 *
 * const scopeResult = validateOneOf(command.scope, SCOPES, 'scope', 'INVALID_SCOPE');
 * if (Result.isFailure(scopeResult)) return scopeResult;
 * ```
 */

import { Result, UseCaseError } from '@tenantgate/domain-core';

/**
 * Validate that a value is not null, undefined, or a blank string.
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<NonNullable<T>> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a string matches a pattern.
 */
export function validateFormat(
	value: string,
	pattern: RegExp,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<string> {
	if (!pattern.test(value)) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} has invalid format`, {
				field: fieldName,
				pattern: pattern.source,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a string does not exceed a maximum length.
 */
export function validateMaxLength(
	value: string,
	maxLength: number,
	fieldName: string,
	errorCode: string,
): Result<string> {
	if (value.length > maxLength) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be ${maxLength} characters or less`, {
				field: fieldName,
				length: value.length,
				maxLength,
			}),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a number is a positive integer, as database ids are.
 */
export function validatePositiveId(value: number, fieldName: string, errorCode: string): Result<number> {
	if (!Number.isInteger(value) || value <= 0) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be a positive integer`, { field: fieldName, value }),
		);
	}

	return Result.success(value);
}

/**
 * Validate that a value is one of the allowed values.
 */
export function validateOneOf<T extends string>(
	value: string,
	allowedValues: readonly T[],
	fieldName: string,
	errorCode: string,
): Result<T> {
	const match = allowedValues.find((allowed) => allowed === value);
	if (match === undefined) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be one of: ${allowedValues.join(', ')}`, {
				field: fieldName,
				value,
				allowedValues,
			}),
		);
	}

	return Result.success(match);
}

/**
 * Validate an email address format.
 */
export function validateEmail(
	email: string,
	fieldName: string = 'email',
	errorCode: string = 'INVALID_EMAIL',
): Result<string> {
	// Basic shape check only
	const emailPattern = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

	if (!emailPattern.test(email)) {
		return Result.failure(UseCaseError.validation(errorCode, 'Invalid email format', { field: fieldName, email }));
	}

	return Result.success(email);
}

/**
 * Chain multiple validations together.
 * Stops at the first failure.
 *
 * @example
 * ```typescript
 * const result = validateAll(
 *     () => validateRequired(command.name, 'name', 'MISSING_REQUIRED_FIELD'),
 *     () => validateMaxLength(command.name, 100, 'name', 'NAME_TOO_LONG'),
 * );
 * if (Result.isFailure(result)) return result;
 * ```
 */
export function validateAll(...validations: Array<() => Result<unknown>>): Result<void> {
	for (const validation of validations) {
		const result = validation();
		if (Result.isFailure(result)) {
			return Result.failure(result.error);
		}
	}

	return Result.success(undefined);
}
