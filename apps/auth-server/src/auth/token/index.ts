import { createAsymmetricSigner } from './asymmetric-signer.js';
import { createHmacSigner } from './hmac-signer.js';
import type { TokenSigner, TokenSignerConfig } from './token-signer.js';

export * from './claims.js';
export * from './token-signer.js';
export { createHmacSigner, type HmacSignerConfig } from './hmac-signer.js';
export { createAsymmetricSigner, type AsymmetricSignerConfig } from './asymmetric-signer.js';

/**
 * Create the signer for the configured strategy.
 */
export async function createTokenSigner(config: TokenSignerConfig): Promise<TokenSigner> {
	switch (config.strategy) {
		case 'hmac':
			return createHmacSigner(config);
		case 'asymmetric':
			return createAsymmetricSigner(config);
	}
}
