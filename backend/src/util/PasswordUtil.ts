import { hash, verify } from "@node-rs/argon2";

export interface PasswordHasher {
	hash(password: string): Promise<string>;
	verify(passwordHash: string, password: string): Promise<boolean>;
}

export function createArgon2Hasher(): PasswordHasher {
	return {
		hash: password => hash(password),
		// constant-time comparison
		verify: (passwordHash, password) => verify(passwordHash, password),
	};
}
