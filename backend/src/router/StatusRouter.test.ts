import { MemoryStore } from "../services/MemoryStore";
import { createFakeTenantServer } from "../test/fakes/FakeTenantServer";
import { createStatusRouter } from "./StatusRouter";
import express, { type Express } from "express";
import request from "supertest";
import { beforeEach, describe, expect, it, vi } from "vitest";

describe("StatusRouter", () => {
	let app: Express;
	let cache: MemoryStore;

	beforeEach(() => {
		cache = new MemoryStore();
		app = express();
		app.use(
			"/status",
			createStatusRouter({
				cache,
				connectionManager: createFakeTenantServer().connectionManager,
				now: () => new Date("2026-03-01T12:00:00.000Z"),
			}),
		);
	});

	it("should return 'OK' on GET /check", async () => {
		const response = await request(app).get("/status/check");

		expect(response.status).toBe(200);
		expect(response.text).toBe("OK");
	});

	it("reports healthy while the cache answers", async () => {
		const response = await request(app).get("/status/health");

		expect(response.status).toBe(200);
		expect(response.body).toEqual({
			status: "healthy",
			timestamp: "2026-03-01T12:00:00.000Z",
			checks: { cache: "up" },
			openTenantConnections: 0,
		});
	});

	it("reports unhealthy when the cache is down", async () => {
		vi.spyOn(cache, "ping").mockRejectedValue(new Error("connection refused"));

		const response = await request(app).get("/status/health");

		expect(response.status).toBe(503);
		expect(response.body.checks).toEqual({ cache: "down" });
	});
});
