import { AppError, ValidationError } from "./AppError";
import { getLog } from "./Logger";
import type { Response } from "express";
import type { ZodType, ZodTypeDef } from "zod";

const log = getLog(import.meta);

/**
 * Validates request input against a zod schema.
 * @throws ValidationError listing every failing field
 */
export function parseInput<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
	const result = schema.safeParse(input);
	if (!result.success) {
		throw new ValidationError(
			result.error.issues.map(issue => ({
				field: issue.path.join("."),
				message: issue.message,
			})),
		);
	}
	return result.data;
}

/**
 * Parses a positive integer route parameter.
 * @throws ValidationError when the value is not one
 */
export function parseId(value: string | undefined, field = "id"): number {
	const id = Number(value);
	if (!Number.isSafeInteger(id) || id <= 0) {
		throw new ValidationError([{ field, message: "Must be a positive integer" }]);
	}
	return id;
}

/**
 * Writes an error as `{ error, code }` JSON. AppErrors carry their own status
 * and client-safe message; anything else is logged and reported as a bare 500.
 */
export function sendError(res: Response, error: unknown): void {
	if (error instanceof ValidationError) {
		res.status(error.status).json({ error: error.message, code: error.code, issues: error.issues });
		return;
	}
	if (error instanceof AppError) {
		if (error.status >= 500) {
			log.error({ err: error, cause: error.cause, code: error.code }, "%s: %s", error.name, error.message);
		} else {
			log.debug("Rejected request with %s (%d)", error.code, error.status);
		}
		res.status(error.status).json({ error: error.message, code: error.code });
		return;
	}
	log.error(error, "Unhandled error");
	res.status(500).json({ error: "Internal server error" });
}
