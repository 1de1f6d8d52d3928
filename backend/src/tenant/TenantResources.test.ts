import { MemoryStore } from "../services/MemoryStore";
import { createTenantResourceManager, tenantKeyPrefix } from "./TenantResources";
import { afterEach, describe, expect, it, vi } from "vitest";

describe("TenantResources", () => {
	const cache = new MemoryStore();

	afterEach(async () => {
		await cache.del(...(await cache.keys("*")));
	});

	it("builds tenant-keyed handles", () => {
		const manager = createTenantResourceManager({ cache, fileStorageRoot: "/var/storefront" });

		const resources = manager.forTenant("t1", "tenant_t1");

		expect(resources.cachePrefix).toBe("tenant:t1:");
		expect(resources.fileRoot).toBe("/var/storefront/tenant_t1");
		expect(resources.queueName("emails")).toBe("tenant:t1:emails");
	});

	it("writes cache entries under the tenant prefix", async () => {
		const manager = createTenantResourceManager({ cache, fileStorageRoot: "/var/storefront" });

		await manager.forTenant("t1", "tenant_t1").cache.set("cart", "2");

		expect(await cache.get(`${tenantKeyPrefix("t1")}cart`)).toBe("2");
	});

	it("purges only the tenant's keys and its file directory", async () => {
		const removeDirectory = vi.fn().mockResolvedValue(undefined);
		const manager = createTenantResourceManager({ cache, fileStorageRoot: "/var/storefront", removeDirectory });
		await manager.forTenant("t1", "tenant_t1").cache.set("cart", "2");
		await manager.forTenant("t2", "tenant_t2").cache.set("cart", "5");

		await manager.purge("t1", "tenant_t1");

		expect(await cache.keys("*")).toEqual(["tenant:t2:cart"]);
		expect(removeDirectory).toHaveBeenCalledWith("/var/storefront/tenant_t1");
	});
});
