/**
 * RoleService - role management for the active tenant.
 *
 * Only the web platform has an implementation; binding it for any other
 * platform fails with NoImplementationFoundError.
 */

import type { Role } from "../model/Role";
import { type BindingScope, defineContract } from "../platform/PlatformRegistry";
import { requireDatabase } from "../tenant/TenantContext";
import { ForbiddenError, NotFoundError, ValidationError } from "../util/AppError";
import { getLog } from "../util/Logger";
import { parseInput } from "../util/RouterUtil";
import type { PermissionService } from "./PermissionService";
import type { RoleInfo } from "storefront-common";
import { z } from "zod";

const log = getLog(import.meta);

export interface RoleInput {
	name: string;
	displayName: string | null;
	description: string | null;
	permissions: Array<string>;
}

export interface RoleRequest {
	parse(body: unknown): RoleInput;
}

export interface RoleService {
	listRoles(): Promise<Array<RoleInfo>>;
	/** Creates a role; the actor must already hold every permission it grants. */
	createRole(actorId: number, body: unknown): Promise<RoleInfo>;
	deleteRole(id: number): Promise<void>;
}

export const RoleRequest = defineContract<RoleRequest>("RoleRequest");
export const RoleService = defineContract<RoleService>("RoleService");

const RoleSchema = z.object({
	name: z
		.string()
		.trim()
		.regex(/^[a-z][a-z0-9_]*$/, "Must start with a letter and contain only lowercase letters, digits and underscores")
		.max(64),
	display_name: z.string().trim().min(1).nullish(),
	description: z.string().trim().nullish(),
	permissions: z.array(z.string()).default([]),
});

export function createRoleRequest(): RoleRequest {
	return {
		parse(body) {
			const input = parseInput(RoleSchema, body);
			return {
				name: input.name,
				displayName: input.display_name ?? null,
				description: input.description ?? null,
				permissions: [...new Set(input.permissions)],
			};
		},
	};
}

export interface RoleServiceDeps {
	permissionService: PermissionService;
}

export function createRoleService(scope: BindingScope, deps: RoleServiceDeps): RoleService {
	const { permissionService } = deps;

	return { listRoles, createRole, deleteRole };

	async function toRoleInfo(role: Role): Promise<RoleInfo> {
		const permissions = await requireDatabase().roleDao.getPermissions(role.id);
		return {
			id: role.id,
			name: role.name,
			displayName: role.displayName,
			description: role.description,
			isEditable: role.isEditable,
			permissions: permissions.map(permission => permission.name),
		};
	}

	async function listRoles(): Promise<Array<RoleInfo>> {
		const roles = await requireDatabase().roleDao.listAll();
		return Promise.all(roles.filter(role => !role.isPrivate).map(toRoleInfo));
	}

	async function createRole(actorId: number, body: unknown): Promise<RoleInfo> {
		const input = scope.bind(RoleRequest).parse(body);
		const { roleDao, permissionDao } = requireDatabase();

		if (await roleDao.findByName(input.name)) {
			throw new ValidationError([{ field: "name", message: "The name has already been taken" }]);
		}

		const permissions = await permissionDao.findByNames(input.permissions);
		const known = new Set(permissions.map(permission => permission.name));
		const unknown = input.permissions.filter(name => !known.has(name));
		if (unknown.length > 0) {
			throw new ValidationError([{ field: "permissions", message: `Unknown permissions: ${unknown.join(", ")}` }]);
		}
		if (input.permissions.length > 0 && !(await permissionService.hasAllPermissions(actorId, input.permissions))) {
			throw new ForbiddenError("You cannot grant permissions you do not hold");
		}

		const role = await roleDao.create({
			name: input.name,
			displayName: input.displayName,
			description: input.description,
			isPrivate: false,
			isEditable: true,
		});
		await roleDao.syncPermissions(
			role.id,
			permissions.map(permission => permission.id),
		);
		log.info({ roleId: role.id, actorId }, "Created role %s", role.name);
		return toRoleInfo(role);
	}

	async function deleteRole(id: number): Promise<void> {
		const { roleDao } = requireDatabase();
		const role = await roleDao.findById(id);
		if (!role) {
			throw new NotFoundError("Role not found");
		}
		if (!role.isEditable) {
			throw new ForbiddenError(`Role ${role.name} cannot be deleted`);
		}
		await roleDao.delete(id);
		log.info("Deleted role %s", role.name);
	}
}
