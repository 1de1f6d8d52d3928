import { NoImplementationFoundError } from "../platform/PlatformErrors";
import { PlatformRegistry } from "../platform/PlatformRegistry";
import { PlatformScope } from "../platform/PlatformScope";
import { addActiveTenant, createTestTenancy, type TestTenancy } from "../test/fakes/TestTenancy";
import { ForbiddenError, NotFoundError, ValidationError } from "../util/AppError";
import { PermissionService } from "./PermissionService";
import { createRoleRequest, createRoleService, RoleRequest, RoleService } from "./RoleService";
import type { Platform } from "storefront-common";
import { beforeEach, describe, expect, it } from "vitest";

describe("RoleService", () => {
	let tenancy: TestTenancy;
	let tenantId: string;
	let ownerId: number;

	const registry = new PlatformRegistry()
		.register("v1", RoleRequest, { implementation: "WebRoleRequest", platform: "web", create: createRoleRequest })
		.register("v1", RoleService, {
			implementation: "WebRoleService",
			platform: "web",
			create: scope => createRoleService(scope, { permissionService: new PermissionService() }),
		});

	function service(platform: Platform = "web") {
		return new PlatformScope(registry, { version: "v1", platform }).bind(RoleService);
	}

	function inTenant<T>(work: () => Promise<T>) {
		return tenancy.contextManager.runInTenantContext(tenantId, work);
	}

	beforeEach(async () => {
		tenancy = createTestTenancy(() => "00000000-0000-4000-8000-0000000000bb");
		tenantId = await addActiveTenant(tenancy, "Roles");
		ownerId = await tenancy.contextManager.runInTenantContext(tenantId, async ({ database }) => {
			const names = ["read-users", "create-users", "read-orders"];
			const permissions = await Promise.all(
				names.map(name => database.permissionDao.upsertByName({ name, displayName: null, description: null })),
			);
			const admin = await database.roleDao.create({
				name: "merchant_admin",
				displayName: "Merchant Administrator",
				description: null,
				isPrivate: false,
				isEditable: false,
			});
			await database.roleDao.create({
				name: "super_admin",
				displayName: null,
				description: null,
				isPrivate: true,
				isEditable: false,
			});
			await database.roleDao.syncPermissions(
				admin.id,
				permissions.filter(p => p.name !== "read-orders").map(p => p.id),
			);
			const owner = await database.userDao.create({
				name: "Owner",
				email: "owner@store.test",
				passwordHash: "hash",
				status: "active",
			});
			await database.userDao.setRoles(owner.id, [admin.id]);
			return owner.id;
		});
	});

	it("lists public roles with their permissions", async () => {
		const roles = await inTenant(() => service().listRoles());

		expect(roles).toEqual([
			{
				id: 1,
				name: "merchant_admin",
				displayName: "Merchant Administrator",
				description: null,
				isEditable: false,
				permissions: ["create-users", "read-users"],
			},
		]);
	});

	it("creates a role with permissions the actor holds", async () => {
		const role = await inTenant(() =>
			service().createRole(ownerId, { name: "store_clerk", display_name: "Store Clerk", permissions: ["read-users"] }),
		);

		expect(role).toEqual({
			id: 3,
			name: "store_clerk",
			displayName: "Store Clerk",
			description: null,
			isEditable: true,
			permissions: ["read-users"],
		});
	});

	it("rejects permissions the actor does not hold", async () => {
		await expect(
			inTenant(() => service().createRole(ownerId, { name: "packer", permissions: ["read-orders"] })),
		).rejects.toBeInstanceOf(ForbiddenError);
	});

	it("rejects unknown permissions and taken names", async () => {
		await expect(
			inTenant(() => service().createRole(ownerId, { name: "packer", permissions: ["fly-drones"] })),
		).rejects.toMatchObject({ issues: [{ field: "permissions", message: "Unknown permissions: fly-drones" }] });
		await expect(
			inTenant(() => service().createRole(ownerId, { name: "merchant_admin" })),
		).rejects.toBeInstanceOf(ValidationError);
	});

	it("deletes editable roles only", async () => {
		const clerk = await inTenant(() => service().createRole(ownerId, { name: "store_clerk" }));

		await inTenant(() => service().deleteRole(clerk.id));
		await expect(inTenant(() => service().deleteRole(clerk.id))).rejects.toBeInstanceOf(NotFoundError);
		await expect(inTenant(() => service().deleteRole(1))).rejects.toBeInstanceOf(ForbiddenError);
	});

	it("has no mobile implementation", () => {
		expect(() => service("mobile")).toThrow(NoImplementationFoundError);
	});

});
