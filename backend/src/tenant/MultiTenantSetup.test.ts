import { MemoryStore } from "../services/MemoryStore";
import { createFakeCentralDatabase, type FakeCentralDatabase } from "../test/fakes/FakeCentralDatabase";
import { fakePasswordHasher } from "../test/fakes/FakePasswordHasher";
import { createFakeTenantServer, type FakeTenantServer } from "../test/fakes/FakeTenantServer";
import { assembleTenancy, type TenancyParts } from "./MultiTenantSetup";
import { getTenantContext } from "./TenantContext";
import express from "express";
import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const TENANT_ID = "00000000-0000-4000-8000-000000000031";

describe("MultiTenantSetup", () => {
	let central: FakeCentralDatabase;
	let server: FakeTenantServer;
	let cache: MemoryStore;

	function parts(overrides: Partial<TenancyParts> = {}): TenancyParts {
		return {
			central,
			provisioner: server.provisioner,
			connectionManager: server.connectionManager,
			cache,
			fileStorageRoot: "/srv/storefront",
			passwordHasher: fakePasswordHasher,
			ownerRole: "merchant_admin",
			provisionedStatus: "active",
			removeDirectory: () => Promise.resolve(),
			sweepIntervalMs: 0,
			...overrides,
		};
	}

	beforeEach(() => {
		central = createFakeCentralDatabase(() => TENANT_ID);
		server = createFakeTenantServer();
		cache = new MemoryStore();
	});

	afterEach(() => {
		vi.useRealTimers();
	});

	it("wires the lifecycle to the given datastores", async () => {
		const tenancy = assembleTenancy(parts());

		const { tenant } = await tenancy.lifecycle.createTenant({
			tenant: { name: "Store One", description: null },
			domain: "store1.example.com",
			user: { name: "Owner", email: "owner@store1.example.com", password: "test-password-1!" },
		});

		expect(tenant.status).toBe("active");
		expect(await tenancy.directory.resolveTenant("store1.example.com")).toBe(TENANT_ID);
		expect(server.databaseFor(TENANT_ID)).toBeDefined();
	});

	it("leaves new tenants inactive when activation on provision is off", async () => {
		const tenancy = assembleTenancy(parts({ provisionedStatus: "inactive" }));

		const { tenant } = await tenancy.lifecycle.createTenant({
			tenant: { name: "Store One", description: null },
			domain: "store1.example.com",
			user: { name: "Owner", email: "owner@store1.example.com", password: "test-password-1!" },
		});

		expect(tenant.status).toBe("inactive");
	});

	it("serves requests for a tenant through its middleware", async () => {
		const tenancy = assembleTenancy(parts());
		await tenancy.lifecycle.createTenant({
			tenant: { name: "Store One", description: null },
			domain: "store1.example.com",
			user: { name: "Owner", email: "owner@store1.example.com", password: "test-password-1!" },
		});
		const app = express();
		app.use(tenancy.middleware);
		app.get("/", (_req, res) => {
			res.json({ tenantId: getTenantContext()?.tenant.id });
		});

		const response = await request(app).get("/").set("Host", "store1.example.com");

		expect(response.body).toEqual({ tenantId: TENANT_ID });
	});

	it("sweeps idle connections on the configured interval", async () => {
		vi.useFakeTimers();
		const evictExpired = vi.spyOn(server.connectionManager, "evictExpired");
		const tenancy = assembleTenancy(parts({ sweepIntervalMs: 1000 }));

		await vi.advanceTimersByTimeAsync(2500);
		expect(evictExpired).toHaveBeenCalledTimes(2);

		await tenancy.shutdown();
		await vi.advanceTimersByTimeAsync(5000);
		expect(evictExpired).toHaveBeenCalledTimes(2);
	});

	it("closes connections, the cache and the central datastore on shutdown", async () => {
		const closeAll = vi.spyOn(server.connectionManager, "closeAll");
		const closeCache = vi.spyOn(cache, "close");
		const closeCentral = vi.spyOn(central, "close");
		const tenancy = assembleTenancy(parts());

		await tenancy.shutdown();

		expect(closeAll).toHaveBeenCalledOnce();
		expect(closeCache).toHaveBeenCalledOnce();
		expect(closeCentral).toHaveBeenCalledOnce();
	});
});
