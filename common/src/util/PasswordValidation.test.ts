import { getPasswordErrorMessage, validatePassword } from "./PasswordValidation";
import { describe, expect, it } from "vitest";

describe("validatePassword", () => {
	it("accepts letters, numbers and symbols", () => {
		expect(validatePassword("secret-12")).toEqual({ valid: true });
	});

	it("rejects an empty password", () => {
		expect(validatePassword("")).toEqual({ valid: false, error: "required" });
	});

	it("rejects short passwords", () => {
		expect(validatePassword("a1!")).toEqual({ valid: false, error: "too_short" });
	});

	it("requires a letter", () => {
		expect(validatePassword("12345678!")).toEqual({ valid: false, error: "needs_letter" });
	});

	it("requires a number", () => {
		expect(validatePassword("password!")).toEqual({ valid: false, error: "needs_number" });
	});

	it("requires a symbol", () => {
		expect(validatePassword("password1")).toEqual({ valid: false, error: "needs_symbol" });
	});

	it("describes each error", () => {
		expect(getPasswordErrorMessage("too_short")).toBe("Password must be at least 8 characters");
	});
});
