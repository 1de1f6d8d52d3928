import { getPlatformScope } from "../platform/PlatformMiddleware";
import { AuthService } from "../services/AuthService";
import { sendError } from "../util/RouterUtil";
import express, { type Router } from "express";

/**
 * Auth routes that run in the central context: sign-up creates a new store,
 * so no tenant exists for it yet.
 */
export function createCentralAuthRouter(): Router {
	const router = express.Router();

	/**
	 * POST /sign/up
	 *
	 * Creates a tenant and its first user. Validation rules follow the
	 * request's platform.
	 */
	router.post("/sign/up", async (req, res) => {
		try {
			const { tenant, user } = await getPlatformScope(req).bind(AuthService).signUp(req.body);
			res.status(201).json({ message: "Created successfully", data: { tenant, user } });
		} catch (error) {
			sendError(res, error);
		}
	});

	/**
	 * GET /platform
	 *
	 * The (version, platform) pair resolved for this request.
	 */
	router.get("/platform", (req, res) => {
		try {
			res.json(getPlatformScope(req).bind(AuthService).whatIsMyPlatform());
		} catch (error) {
			sendError(res, error);
		}
	});

	return router;
}

/**
 * Auth routes that need a resolved tenant.
 */
export function createTenantAuthRouter(): Router {
	const router = express.Router();

	/**
	 * POST /sign/in
	 *
	 * Issues a token that only this store accepts.
	 */
	router.post("/sign/in", async (req, res) => {
		try {
			const data = await getPlatformScope(req).bind(AuthService).signIn(req.body);
			res.json({ message: "Successfully signed in", data });
		} catch (error) {
			sendError(res, error);
		}
	});

	return router;
}
