/**
 * Password rules for merchant owners, shared by every sign-up request variant.
 */

export type PasswordValidationError = "required" | "too_short" | "needs_letter" | "needs_number" | "needs_symbol";

export interface PasswordValidationResult {
	valid: boolean;
	error?: PasswordValidationError;
}

export const PASSWORD_MIN_LENGTH = 8;

const LETTER = /\p{L}/u;
const NUMBER = /\p{N}/u;
// Punctuation, symbols and separators all count.
const SYMBOL = /[\p{P}\p{S}\p{Z}]/u;

export function validatePassword(password: string): PasswordValidationResult {
	if (!password) {
		return { valid: false, error: "required" };
	}
	if (password.length < PASSWORD_MIN_LENGTH) {
		return { valid: false, error: "too_short" };
	}
	if (!LETTER.test(password)) {
		return { valid: false, error: "needs_letter" };
	}
	if (!NUMBER.test(password)) {
		return { valid: false, error: "needs_number" };
	}
	if (!SYMBOL.test(password)) {
		return { valid: false, error: "needs_symbol" };
	}
	return { valid: true };
}

const MESSAGES: Record<PasswordValidationError, string> = {
	required: "Password is required",
	too_short: `Password must be at least ${PASSWORD_MIN_LENGTH} characters`,
	needs_letter: "Password must contain at least one letter",
	needs_number: "Password must contain at least one number",
	needs_symbol: "Password must contain at least one symbol",
};

export function getPasswordErrorMessage(error: PasswordValidationError): string {
	return MESSAGES[error];
}
