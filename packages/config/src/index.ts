import 'dotenv/config';
import { readFileSync } from 'node:fs';
import { z } from 'zod/v4';

export { z } from 'zod/v4';

/**
 * Parse environment variables with Zod schema validation.
 * Throws one error listing every invalid key.
 */
export function parseEnv<T extends z.ZodRawShape>(
	schema: z.ZodObject<T>,
	env: Record<string, string | undefined> = process.env,
): z.infer<z.ZodObject<T>> {
	const result = schema.safeParse(env);

	if (!result.success) {
		const errors = result.error.issues.map((issue) => {
			const key = issue.path.length > 0 ? issue.path.map(String).join('.') : '(root)';
			return `  ${key}: ${issue.message}`;
		});

		throw new Error(`Environment validation failed:\n${errors.join('\n')}`);
	}

	return result.data;
}

/**
 * Common environment variable schemas for reuse.
 *
 * Note: In zod v4, .default() on a transformed schema expects the OUTPUT type.
 * Use .prefault() to provide an INPUT default (applied before parsing).
 */
export const CommonEnvSchemas = {
	/** Log level enum */
	logLevel: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

	/** Runtime environment */
	nodeEnv: z.enum(['development', 'production', 'test']).default('development'),

	/** Port number */
	port: z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().min(1).max(65535))
		.prefault('3000'),

	/** Boolean from string */
	boolean: z
		.string()
		.transform((v) => v === 'true' || v === '1')
		.prefault('false'),

	/** URL validation */
	url: z.url(),

	/** Optional non-empty string; blank values count as unset */
	optionalString: z
		.string()
		.optional()
		.transform((v) => (v === undefined || v.trim() === '' ? undefined : v)),
};

/**
 * Positive integer from string, with an input default.
 */
export function positiveInt(defaultValue: number) {
	return z
		.string()
		.transform((v) => Number.parseInt(v, 10))
		.pipe(z.number().int().positive())
		.prefault(String(defaultValue));
}

/**
 * Resolve a PEM (or other secret) given either inline or as a file path.
 * Inline wins when both are set. Returns undefined when neither is.
 */
export function readInlineOrFile(inline: string | undefined, path: string | undefined): string | undefined {
	if (inline !== undefined) {
		// Single-line env values carry escaped newlines
		return inline.replace(/\\n/g, '\n');
	}
	if (path !== undefined) {
		return readFileSync(path, 'utf8');
	}
	return undefined;
}
