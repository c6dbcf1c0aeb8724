/**
 * Token signer contract
 *
 * One interface, two strategies, chosen once at startup. Signers only sign
 * and verify; they never add or change claims.
 */

import type { TokenType } from '../../domain/index.js';
import type { TokenClaims } from './claims.js';

export interface TokenSigner {
	readonly kind: TokenType;
	/** Whether refresh tokens carry a random nonce under this strategy. */
	readonly requiresNonce: boolean;
	sign(claims: TokenClaims): Promise<string>;
	/** Decoded payload when the signature checks out, otherwise null. Expiry is not checked here. */
	verify(token: string): Promise<Record<string, unknown> | null>;
}

export class TokenSigningError extends Error {
	constructor(message: string, cause: unknown) {
		super(message, { cause });
		this.name = 'TokenSigningError';
	}
}

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];

export type TokenSignerConfig =
	| { readonly strategy: 'hmac'; readonly secret: string; readonly algorithm: HmacAlgorithm }
	| { readonly strategy: 'asymmetric'; readonly privateKeyPem: string; readonly publicKeyPem: string };

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function encodeClaims(claims: TokenClaims): Uint8Array {
	return encoder.encode(JSON.stringify(claims));
}

/**
 * Decode a verified JWS payload into an object, or null when it is not JSON
 * object text.
 */
export function decodePayload(payload: Uint8Array): Record<string, unknown> | null {
	try {
		const parsed: unknown = JSON.parse(decoder.decode(payload));
		if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) return null;
		return { ...parsed };
	} catch {
		return null;
	}
}
