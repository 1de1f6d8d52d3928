import type { PermissionService } from "../services/PermissionService";
import { addActiveTenant, createTestTenancy, type TestTenancy } from "../test/fakes/TestTenancy";
import type { SessionClaims, TokenUtil } from "../util/TokenUtil";
import { createPermissionMiddleware, getSession } from "./PermissionMiddleware";
import type { NextFunction, Request, Response } from "express";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";

describe("PermissionMiddleware", () => {
	let tenancy: TestTenancy;
	let tenantId: string;
	let decodePayload: Mock<(req: Request) => SessionClaims | undefined>;
	let hasAnyPermission: Mock<(userId: number, permissions: Array<string>) => Promise<boolean>>;
	let middleware: ReturnType<typeof createPermissionMiddleware>;
	let mockRequest: Request;
	let mockResponse: { status: Mock; json: Mock };
	let mockNext: NextFunction;

	function claims(overrides: Partial<SessionClaims> = {}): SessionClaims {
		return { userId: 7, email: "owner@store.test", tenantId, platform: "web", ...overrides };
	}

	beforeEach(async () => {
		tenancy = createTestTenancy(() => "00000000-0000-4000-8000-0000000000cc");
		tenantId = await addActiveTenant(tenancy, "Guarded");

		decodePayload = vi.fn<(req: Request) => SessionClaims | undefined>();
		hasAnyPermission = vi.fn<(userId: number, permissions: Array<string>) => Promise<boolean>>();
		const tokenUtil = { decodePayload } as unknown as TokenUtil<SessionClaims>;
		const permissionService = { hasAnyPermission } as unknown as PermissionService;
		middleware = createPermissionMiddleware({ tokenUtil, permissionService });

		mockRequest = { method: "GET", originalUrl: "/api/v1/roles" } as Request;
		mockResponse = { status: vi.fn(), json: vi.fn() };
		mockResponse.status.mockReturnValue(mockResponse);
		mockNext = vi.fn();
	});

	function inTenant(run: () => unknown) {
		return tenancy.contextManager.runInTenantContext(tenantId, async () => {
			await run();
		});
	}

	describe("requireAuth", () => {
		it("stores the session of a valid token", async () => {
			decodePayload.mockReturnValue(claims());

			await inTenant(() => middleware.requireAuth()(mockRequest, mockResponse as unknown as Response, mockNext));

			expect(mockNext).toHaveBeenCalled();
			expect(getSession(mockRequest)).toEqual(claims());
		});

		it("rejects a missing token", async () => {
			decodePayload.mockReturnValue(undefined);

			await inTenant(() => middleware.requireAuth()(mockRequest, mockResponse as unknown as Response, mockNext));

			expect(mockNext).not.toHaveBeenCalled();
			expect(mockResponse.status).toHaveBeenCalledWith(401);
			expect(mockResponse.json).toHaveBeenCalledWith({ error: "Authentication required", code: "unauthenticated" });
		});

		it("rejects a token issued for another tenant", async () => {
			decodePayload.mockReturnValue(claims({ tenantId: "00000000-0000-4000-8000-0000000000dd" }));

			await inTenant(() => middleware.requireAuth()(mockRequest, mockResponse as unknown as Response, mockNext));

			expect(mockNext).not.toHaveBeenCalled();
			expect(mockResponse.json).toHaveBeenCalledWith({
				error: "Token was not issued for this store",
				code: "unauthenticated",
			});
		});
	});

	describe("requirePermission", () => {
		it("passes users holding one of the permissions", async () => {
			decodePayload.mockReturnValue(claims());
			hasAnyPermission.mockResolvedValue(true);

			await inTenant(() =>
				middleware.requirePermission("read-roles")(mockRequest, mockResponse as unknown as Response, mockNext),
			);

			expect(hasAnyPermission).toHaveBeenCalledWith(7, ["read-roles"]);
			expect(mockNext).toHaveBeenCalled();
		});

		it("forbids users without the permissions", async () => {
			decodePayload.mockReturnValue(claims());
			hasAnyPermission.mockResolvedValue(false);

			await inTenant(() =>
				middleware.requirePermission("delete-roles")(mockRequest, mockResponse as unknown as Response, mockNext),
			);

			expect(mockNext).not.toHaveBeenCalled();
			expect(mockResponse.status).toHaveBeenCalledWith(403);
		});
	});

	it("has no session for unauthenticated requests", () => {
		expect(() => getSession({} as Request)).toThrow("Authentication required");
	});
});
