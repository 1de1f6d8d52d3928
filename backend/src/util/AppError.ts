/**
 * Error categories, each mapped to a distinct handling policy:
 * - configuration: deployment defect, never retried, logged at error level
 * - client: rejected input the caller may correct
 * - not_found / forbidden: request targets something unavailable
 * - provisioning: tenant creation or deletion failed after cleanup
 * - context: tenant-context misuse, a programming error
 */
export type ErrorKind = "configuration" | "client" | "not_found" | "forbidden" | "provisioning" | "context";

/**
 * Base class for errors the HTTP layer knows how to report.
 * `message` is safe to show to a client; internal detail belongs in `cause`.
 */
export class AppError extends Error {
	readonly kind: ErrorKind;
	readonly status: number;
	readonly code: string;

	constructor(kind: ErrorKind, status: number, code: string, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "AppError";
		this.kind = kind;
		this.status = status;
		this.code = code;
	}
}

export interface ValidationIssue {
	field: string;
	message: string;
}

/** Request input failed validation. */
export class ValidationError extends AppError {
	readonly issues: Array<ValidationIssue>;

	constructor(issues: Array<ValidationIssue>) {
		super("client", 422, "validation_failed", "The given data was invalid");
		this.name = "ValidationError";
		this.issues = issues;
	}
}

export class InvalidCredentialsError extends AppError {
	constructor() {
		super("client", 401, "invalid_credentials", "Invalid email or password");
		this.name = "InvalidCredentialsError";
	}
}

export class NotFoundError extends AppError {
	constructor(message: string) {
		super("not_found", 404, "not_found", message);
		this.name = "NotFoundError";
	}
}

export class ForbiddenError extends AppError {
	constructor(message: string) {
		super("forbidden", 403, "forbidden", message);
		this.name = "ForbiddenError";
	}
}

export class UnauthorizedError extends AppError {
	constructor(message = "Authentication required") {
		super("client", 401, "unauthenticated", message);
		this.name = "UnauthorizedError";
	}
}
