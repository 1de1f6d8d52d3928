import type { TenantLifecycle } from "../tenant/TenantLifecycle";
import { UnauthorizedError } from "../util/AppError";
import { getLog } from "../util/Logger";
import { parseInput, sendError } from "../util/RouterUtil";
import express, { type NextFunction, type Request, type Response, type Router } from "express";
import { timingSafeEqual } from "node:crypto";
import { z } from "zod";

const log = getLog(import.meta);

export const ADMIN_SECRET_HEADER = "x-admin-secret";

const TenantParamsSchema = z.object({ id: z.string().uuid() });

const StatusBodySchema = z.object({ status: z.enum(["active", "inactive", "suspended"]) });

export interface AdminRouterOptions {
	lifecycle: TenantLifecycle;
	/** Admin routes answer 404 while this is unset */
	adminSecret: string | undefined;
}

function secretMatches(expected: string, given: string | Array<string> | undefined): boolean {
	if (typeof given !== "string") {
		return false;
	}
	const a = Buffer.from(expected);
	const b = Buffer.from(given);
	return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Operator endpoints for tenant administration. Runs in the central context,
 * NOT behind TenantMiddleware.
 */
export function createAdminRouter(options: AdminRouterOptions): Router {
	const { lifecycle, adminSecret } = options;
	const router = express.Router();

	router.use((req: Request, res: Response, next: NextFunction) => {
		if (!adminSecret) {
			res.status(404).json({ error: "Not found" });
			return;
		}
		if (!secretMatches(adminSecret, req.headers[ADMIN_SECRET_HEADER])) {
			log.warn("Rejected admin request %s %s", req.method, req.originalUrl);
			sendError(res, new UnauthorizedError("Invalid admin secret"));
			return;
		}
		next();
	});

	/**
	 * GET /tenants
	 *
	 * Provisioned tenants with their domains.
	 */
	router.get("/tenants", async (_req, res) => {
		try {
			res.json({ data: await lifecycle.listTenants() });
		} catch (error) {
			sendError(res, error);
		}
	});

	router.get("/tenants/:id", async (req, res) => {
		try {
			const { id } = parseInput(TenantParamsSchema, req.params);
			res.json({ data: await lifecycle.getTenant(id) });
		} catch (error) {
			sendError(res, error);
		}
	});

	/**
	 * PATCH /tenants/:id/status
	 *
	 * Moves a tenant among active, inactive and suspended.
	 */
	router.patch("/tenants/:id/status", async (req, res) => {
		try {
			const { id } = parseInput(TenantParamsSchema, req.params);
			const { status } = parseInput(StatusBodySchema, req.body);
			res.json({ data: await lifecycle.updateTenantStatus(id, status) });
		} catch (error) {
			sendError(res, error);
		}
	});

	/**
	 * DELETE /tenants/:id
	 *
	 * Removes the tenant's domains, datastore, cache keys and files, then the
	 * tenant itself. Safe to repeat after a partial failure.
	 */
	router.delete("/tenants/:id", async (req, res) => {
		try {
			const { id } = parseInput(TenantParamsSchema, req.params);
			await lifecycle.deleteTenant(id);
			res.status(204).send();
		} catch (error) {
			sendError(res, error);
		}
	});

	router.post("/tenants/:id/seed-roles", async (req, res) => {
		try {
			const { id } = parseInput(TenantParamsSchema, req.params);
			res.json({ data: await lifecycle.reseedRoles(id) });
		} catch (error) {
			sendError(res, error);
		}
	});

	return router;
}
