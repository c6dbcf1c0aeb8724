/**
 * Argon2id password hashing.
 *
 * Output is a PHC string: $argon2id$v=19$m=65536,t=3,p=4$<salt>$<hash>
 */

import argon2, { type Options } from 'argon2';

const ARGON2_OPTIONS: Options = {
	type: argon2.argon2id,
	memoryCost: 65536,
	timeCost: 3,
	parallelism: 4,
	hashLength: 32,
};

export interface PasswordHasher {
	hash(password: string): Promise<string>;
	/** False for a wrong password or a malformed hash. */
	verify(hash: string, password: string): Promise<boolean>;
}

export function createArgon2PasswordHasher(): PasswordHasher {
	return {
		hash(password) {
			return argon2.hash(password, ARGON2_OPTIONS);
		},

		async verify(hash, password) {
			try {
				return await argon2.verify(hash, password);
			} catch {
				return false;
			}
		},
	};
}
