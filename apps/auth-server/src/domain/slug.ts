import { Result, UseCaseError } from '@tenantgate/domain-core';

/**
 * Derive a slug: lower-case, drop everything outside `[a-z0-9\s-]`, collapse
 * runs of whitespace and hyphens into one hyphen, trim hyphens at both ends.
 * May return an empty string.
 */
export function generateSlug(value: string): string {
	return value
		.toLowerCase()
		.replace(/[^a-z0-9\s-]/g, '')
		.replace(/[\s-]+/g, '-')
		.replace(/^-+|-+$/g, '');
}

/**
 * {@link generateSlug}, failing with `INVALID_SLUG` when nothing is left.
 */
export function createSlug(value: string, field = 'slug'): Result<string> {
	const slug = generateSlug(value);
	if (slug === '') {
		return Result.failure(
			UseCaseError.validation('INVALID_SLUG', `Cannot derive a slug from "${value}"`, { field, value }),
		);
	}
	return Result.success(slug);
}
