/**
 * RoleRouter - role management inside the current store.
 *
 * Provides endpoints for:
 * - Listing roles with their permissions
 * - Creating custom roles
 * - Deleting custom roles (built-in roles are immutable)
 */

import { getSession, type PermissionMiddlewareFactory } from "../middleware/PermissionMiddleware";
import { getPlatformScope } from "../platform/PlatformMiddleware";
import { RoleService } from "../services/RoleService";
import { parseId, sendError } from "../util/RouterUtil";
import express, { type Router } from "express";

/**
 * Dependencies for the role router.
 */
export interface RoleRouterDependencies {
	permissionMiddleware: PermissionMiddlewareFactory;
}

/**
 * Create the role router. Mount behind the tenant middleware.
 */
export function createRoleRouter(deps: RoleRouterDependencies): Router {
	const { permissionMiddleware } = deps;
	const router = express.Router();

	/**
	 * GET /
	 *
	 * List all non-private roles.
	 * Requires: read-roles permission
	 */
	router.get("/", permissionMiddleware.requirePermission("read-roles"), async (req, res) => {
		try {
			const roles = await getPlatformScope(req).bind(RoleService).listRoles();
			res.json({ data: roles });
		} catch (error) {
			sendError(res, error);
		}
	});

	/**
	 * POST /
	 *
	 * Create a role. The caller must hold every permission it grants.
	 * Requires: create-roles permission
	 */
	router.post("/", permissionMiddleware.requirePermission("create-roles"), async (req, res) => {
		try {
			const { userId } = getSession(req);
			const role = await getPlatformScope(req).bind(RoleService).createRole(userId, req.body);
			res.status(201).json({ message: "Created successfully", data: role });
		} catch (error) {
			sendError(res, error);
		}
	});

	/**
	 * DELETE /:id
	 *
	 * Delete a custom role.
	 * Requires: delete-roles permission
	 */
	router.delete("/:id", permissionMiddleware.requirePermission("delete-roles"), async (req, res) => {
		try {
			const id = parseId(req.params.id);
			await getPlatformScope(req).bind(RoleService).deleteRole(id);
			res.status(204).send();
		} catch (error) {
			sendError(res, error);
		}
	});

	return router;
}
