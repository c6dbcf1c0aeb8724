/**
 * Shared-secret strategy: compact JWS with HS256/384/512.
 */

import * as jose from 'jose';
import { decodePayload, encodeClaims, TokenSigningError, type HmacAlgorithm, type TokenSigner } from './token-signer.js';

export interface HmacSignerConfig {
	readonly secret: string;
	readonly algorithm: HmacAlgorithm;
}

export function createHmacSigner(config: HmacSignerConfig): TokenSigner {
	const key = new TextEncoder().encode(config.secret);
	const { algorithm } = config;

	return {
		kind: 'jwt',
		requiresNonce: false,

		async sign(claims) {
			try {
				return await new jose.CompactSign(encodeClaims(claims))
					.setProtectedHeader({ alg: algorithm, typ: 'JWT' })
					.sign(key);
			} catch (error) {
				throw new TokenSigningError('Failed to sign token', error);
			}
		},

		async verify(token) {
			try {
				const { payload } = await jose.compactVerify(token, key, { algorithms: [algorithm] });
				return decodePayload(payload);
			} catch {
				return null;
			}
		},
	};
}
