import { createPlatformDetector } from "../platform/PlatformDetector";
import { createPlatformMiddleware } from "../platform/PlatformMiddleware";
import { PlatformRegistry } from "../platform/PlatformRegistry";
import { AuthService } from "../services/AuthService";
import { DuplicateDomainError } from "../tenant/TenantErrors";
import { InvalidCredentialsError } from "../util/AppError";
import { createCentralAuthRouter, createTenantAuthRouter } from "./AuthRouter";
import express, { type Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("AuthRouter", () => {
	let app: Express;
	let service: AuthService;

	beforeEach(() => {
		service = {
			signUp: vi.fn(),
			signIn: vi.fn(),
			whatIsMyPlatform: vi.fn().mockReturnValue({ version: "v1", platform: "web" }),
		};
		const registry = new PlatformRegistry().register("v1", AuthService, {
			implementation: "WebAuthService",
			platform: "web",
			create: () => service,
		});
		const detector = createPlatformDetector({ versions: ["v1"], platforms: ["web", "mobile"], header: "x-platform" });

		app = express();
		app.use(express.json());
		app.use("/api/:version", createPlatformMiddleware({ detector, registry }));
		app.use("/api/:version/auth", createCentralAuthRouter(), createTenantAuthRouter());
	});

	it("answers 201 with the created store", async () => {
		vi.mocked(service.signUp).mockResolvedValue({
			tenant: {
				id: "00000000-0000-4000-8000-0000000000c1",
				name: "Store One",
				description: null,
				status: "active",
				createdAt: new Date("2026-03-01T00:00:00Z"),
				updatedAt: new Date("2026-03-01T00:00:00Z"),
			},
			user: { id: 1, name: "Owner", email: "owner@store1.example.com", status: "active", roles: ["merchant_admin"] },
		});

		const response = await request(app)
			.post("/api/v1/auth/sign/up")
			.set("X-Platform", "web")
			.send({ merchant_subdomain: "store1" });

		expect(response.status).toBe(201);
		expect(response.body.message).toBe("Created successfully");
		expect(response.body.data.user.email).toBe("owner@store1.example.com");
		expect(service.signUp).toHaveBeenCalledWith({ merchant_subdomain: "store1" });
	});

	it("reports a taken domain as 409", async () => {
		vi.mocked(service.signUp).mockRejectedValue(new DuplicateDomainError("store1.example.com"));

		const response = await request(app).post("/api/v1/auth/sign/up").set("X-Platform", "web").send({});

		expect(response.status).toBe(409);
		expect(response.body.code).toBe("duplicate_domain");
	});

	it("returns the token on sign-in", async () => {
		vi.mocked(service.signIn).mockResolvedValue({
			token: "test-token",
			expiresIn: 7200,
			user: { id: 1, name: "Owner", email: "owner@store1.example.com", status: "active", roles: [] },
		});

		const response = await request(app).post("/api/v1/auth/sign/in").set("X-Platform", "web").send({});

		expect(response.status).toBe(200);
		expect(response.body).toEqual({
			message: "Successfully signed in",
			data: {
				token: "test-token",
				expiresIn: 7200,
				user: { id: 1, name: "Owner", email: "owner@store1.example.com", status: "active", roles: [] },
			},
		});
	});

	it("reports wrong credentials as 401", async () => {
		vi.mocked(service.signIn).mockRejectedValue(new InvalidCredentialsError());

		const response = await request(app).post("/api/v1/auth/sign/in").set("X-Platform", "web").send({});

		expect(response.status).toBe(401);
		expect(response.body).toEqual({ error: "Invalid email or password", code: "invalid_credentials" });
	});

	it("reports the resolved platform", async () => {
		const response = await request(app).get("/api/v1/auth/platform").set("X-Platform", "web");

		expect(response.body).toEqual({ version: "v1", platform: "web" });
	});

	it("fails with 500 when the platform has no auth service", async () => {
		const response = await request(app).get("/api/v1/auth/platform").set("X-Platform", "mobile");

		expect(response.status).toBe(500);
		expect(response.body.code).toBe("no_implementation");
	});
});
