/**
 * Extract the credential from an `Authorization: Bearer <token>` header.
 * The scheme is matched case-insensitively; anything else yields null.
 */
export function extractBearerToken(header: string | undefined): string | null {
	if (!header) return null;
	const match = /^Bearer\s+(\S+)\s*$/i.exec(header);
	return match?.[1] ?? null;
}
