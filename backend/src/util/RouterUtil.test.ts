import { ForbiddenError, ValidationError } from "./AppError";
import { parseId, parseInput, sendError } from "./RouterUtil";
import type { Response } from "express";
import { describe, expect, it, vi } from "vitest";
import { z } from "zod";

function mockResponse() {
	const res = {
		status: vi.fn(),
		json: vi.fn(),
	};
	res.status.mockReturnValue(res);
	res.json.mockReturnValue(res);
	return res;
}

describe("RouterUtil", () => {
	describe("parseInput", () => {
		const schema = z.object({ name: z.string().min(2), tags: z.array(z.string()).default([]) });

		it("returns parsed data with defaults applied", () => {
			expect(parseInput(schema, { name: "Mugs" })).toEqual({ name: "Mugs", tags: [] });
		});

		it("throws a ValidationError naming each failing field", () => {
			let thrown: unknown;
			try {
				parseInput(schema, { name: "M", tags: [1] });
			} catch (error) {
				thrown = error;
			}

			expect(thrown).toBeInstanceOf(ValidationError);
			expect(thrown).toMatchObject({
				issues: [
					{ field: "name", message: "String must contain at least 2 character(s)" },
					{ field: "tags.0", message: "Expected string, received number" },
				],
			});
		});
	});

	describe("parseId", () => {
		it("accepts positive integers", () => {
			expect(parseId("42")).toBe(42);
		});

		it.each(["0", "-3", "1.5", "abc", undefined])("rejects %s", value => {
			expect(() => parseId(value)).toThrow(ValidationError);
		});
	});

	describe("sendError", () => {
		it("reports validation issues as 422", () => {
			const res = mockResponse();

			sendError(res as unknown as Response, new ValidationError([{ field: "email", message: "Required" }]));

			expect(res.status).toHaveBeenCalledWith(422);
			expect(res.json).toHaveBeenCalledWith({
				error: "The given data was invalid",
				code: "validation_failed",
				issues: [{ field: "email", message: "Required" }],
			});
		});

		it("uses the status and message of an AppError", () => {
			const res = mockResponse();

			sendError(res as unknown as Response, new ForbiddenError("Role cannot be changed"));

			expect(res.status).toHaveBeenCalledWith(403);
			expect(res.json).toHaveBeenCalledWith({ error: "Role cannot be changed", code: "forbidden" });
		});

		it("hides the message of unexpected errors", () => {
			const res = mockResponse();

			sendError(res as unknown as Response, new Error('relation "tenants" does not exist'));

			expect(res.status).toHaveBeenCalledWith(500);
			expect(res.json).toHaveBeenCalledWith({ error: "Internal server error" });
		});
	});
});
