/**
 * OpenAPI Integration
 *
 * TypeBox schemas shared by route definitions, and manual validation for
 * request bodies and params. TypeBox produces JSON Schema directly, which is
 * what @fastify/swagger publishes.
 */

import { Type, type Static, type TSchema, type TObject } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

/**
 * Common TypeBox schemas.
 */
export const CommonSchemas = {
	/** Serial database id */
	Id: Type.Integer({ minimum: 1, description: 'Numeric identifier' }),

	/** Serial id as it arrives in a path parameter */
	IdParam: Type.String({ pattern: '^[1-9][0-9]*$', description: 'Numeric identifier' }),

	/** ISO 8601 datetime string. */
	DateTime: Type.String({ format: 'date-time', description: 'ISO 8601 datetime' }),

	/** Email address. */
	Email: Type.String({ minLength: 3, maxLength: 320, description: 'Email address' }),

	/** Non-empty string. */
	NonEmptyString: Type.String({ minLength: 1, description: 'Non-empty string' }),
};

/**
 * Standard error response schema.
 */
export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown(), { description: 'Additional error details' })),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

/**
 * Route-level response schemas for the error statuses every protected route can return.
 */
export const ProtectedRouteErrors = {
	400: ErrorResponseSchema,
	401: ErrorResponseSchema,
	403: ErrorResponseSchema,
	500: ErrorResponseSchema,
};

/**
 * Safe validation that returns a Result-like object instead of throwing.
 *
 * @example
 * ```typescript
 * const bodyResult = safeValidate(request.body, CreateRoleSchema);
 * if (!bodyResult.success) {
 *     return badRequest(reply, bodyResult.error);
 * }
 * ```
 */
export function safeValidate<T extends TSchema>(
	data: unknown,
	schema: T,
): { success: true; data: Static<T> } | { success: false; error: string } {
	if (Value.Check(schema, data)) {
		return { success: true, data };
	}
	const errors = [...Value.Errors(schema, data)];
	const message = errors.map((e) => `${e.path || '/'}: ${e.message}`).join(', ');
	return { success: false, error: message };
}

/**
 * Parse a numeric path parameter. Returns null for anything but a positive integer.
 */
export function parseIdParam(value: string | undefined): number | null {
	if (value === undefined || !/^[1-9][0-9]*$/.test(value)) return null;
	const id = Number(value);
	return Number.isSafeInteger(id) ? id : null;
}

// Re-export TypeBox for convenience
export { Type, Value, type Static, type TSchema, type TObject };
