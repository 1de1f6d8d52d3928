import { getSession, type PermissionMiddlewareFactory } from "../middleware/PermissionMiddleware";
import { createPlatformDetector } from "../platform/PlatformDetector";
import { createPlatformMiddleware } from "../platform/PlatformMiddleware";
import { PlatformRegistry } from "../platform/PlatformRegistry";
import { RoleService } from "../services/RoleService";
import { ForbiddenError, NotFoundError } from "../util/AppError";
import { createRoleRouter } from "./RoleRouter";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

vi.mock("../middleware/PermissionMiddleware", () => ({
	getSession: vi.fn(),
}));

describe("RoleRouter", () => {
	let app: Express;
	let service: RoleService;
	let mockPermissionMiddleware: PermissionMiddlewareFactory;
	const requiredPermissions: Array<string> = [];

	beforeEach(() => {
		requiredPermissions.length = 0;
		service = {
			listRoles: vi.fn().mockResolvedValue([]),
			createRole: vi.fn(),
			deleteRole: vi.fn().mockResolvedValue(undefined),
		};
		mockPermissionMiddleware = {
			requireAuth: vi.fn(() => (_req: Request, _res: Response, next: NextFunction) => next()),
			requirePermission: vi.fn((...permissions: Array<string>) => {
				requiredPermissions.push(...permissions);
				return (_req: Request, _res: Response, next: NextFunction) => next();
			}),
		};
		vi.mocked(getSession).mockReturnValue({
			userId: 7,
			email: "owner@store1.example.com",
			tenantId: "00000000-0000-4000-8000-0000000000d1",
			platform: "web",
		});

		const registry = new PlatformRegistry().register("v1", RoleService, {
			implementation: "WebRoleService",
			platform: "web",
			create: () => service,
		});
		const detector = createPlatformDetector({ versions: ["v1"], platforms: ["web"], header: "x-platform" });

		app = express();
		app.use(express.json());
		app.use(
			"/api/:version/roles",
			createPlatformMiddleware({ detector, registry }),
			createRoleRouter({ permissionMiddleware: mockPermissionMiddleware }),
		);
	});

	it("guards each route with its permission", () => {
		expect(requiredPermissions).toEqual(["read-roles", "create-roles", "delete-roles"]);
	});

	it("lists roles", async () => {
		vi.mocked(service.listRoles).mockResolvedValue([
			{
				id: 1,
				name: "merchant_admin",
				displayName: "Merchant Administrator",
				description: null,
				isEditable: false,
				permissions: ["read-roles"],
			},
		]);

		const response = await request(app).get("/api/v1/roles").set("X-Platform", "web");

		expect(response.status).toBe(200);
		expect(response.body.data).toHaveLength(1);
		expect(response.body.data[0].name).toBe("merchant_admin");
	});

	it("creates a role on behalf of the session user", async () => {
		vi.mocked(service.createRole).mockResolvedValue({
			id: 2,
			name: "store_clerk",
			displayName: null,
			description: null,
			isEditable: true,
			permissions: [],
		});

		const response = await request(app).post("/api/v1/roles").set("X-Platform", "web").send({ name: "store_clerk" });

		expect(response.status).toBe(201);
		expect(service.createRole).toHaveBeenCalledWith(7, { name: "store_clerk" });
	});

	it("deletes a role", async () => {
		const response = await request(app).delete("/api/v1/roles/2").set("X-Platform", "web");

		expect(response.status).toBe(204);
		expect(service.deleteRole).toHaveBeenCalledWith(2);
	});

	it("rejects a non-numeric id", async () => {
		const response = await request(app).delete("/api/v1/roles/abc").set("X-Platform", "web");

		expect(response.status).toBe(422);
		expect(service.deleteRole).not.toHaveBeenCalled();
	});

	it("maps service errors to their status", async () => {
		vi.mocked(service.deleteRole).mockRejectedValueOnce(new NotFoundError("Role not found"));
		vi.mocked(service.deleteRole).mockRejectedValueOnce(new ForbiddenError("Role merchant_admin cannot be deleted"));

		const missing = await request(app).delete("/api/v1/roles/9").set("X-Platform", "web");
		const builtIn = await request(app).delete("/api/v1/roles/1").set("X-Platform", "web");

		expect(missing.status).toBe(404);
		expect(builtIn.status).toBe(403);
	});
});
