/**
 * Key-pair strategy: compact JWS signed with Ed25519 (EdDSA).
 *
 * Both keys are imported once, when the signer is created, so a bad PEM
 * fails startup instead of the first request.
 */

import * as jose from 'jose';
import { decodePayload, encodeClaims, TokenSigningError, type TokenSigner } from './token-signer.js';

export interface AsymmetricSignerConfig {
	/** PKCS#8 PEM */
	readonly privateKeyPem: string;
	/** SPKI PEM */
	readonly publicKeyPem: string;
}

const ALGORITHM = 'EdDSA';

export async function createAsymmetricSigner(config: AsymmetricSignerConfig): Promise<TokenSigner> {
	const privateKey = await jose.importPKCS8(config.privateKeyPem, ALGORITHM);
	const publicKey = await jose.importSPKI(config.publicKeyPem, ALGORITHM);

	return {
		kind: 'paseto',
		requiresNonce: true,

		async sign(claims) {
			try {
				return await new jose.CompactSign(encodeClaims(claims))
					.setProtectedHeader({ alg: ALGORITHM, typ: 'JWT' })
					.sign(privateKey);
			} catch (error) {
				throw new TokenSigningError('Failed to sign token', error);
			}
		},

		async verify(token) {
			try {
				const { payload } = await jose.compactVerify(token, publicKey, { algorithms: [ALGORITHM] });
				return decodePayload(payload);
			} catch {
				return null;
			}
		},
	};
}
