import type { CacheClient } from "../services/CacheService";
import type { TenantConnectionManager } from "../tenant/TenantConnectionManager";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";

const log = getLog(import.meta);

export interface StatusRouterOptions {
	cache: CacheClient;
	connectionManager: TenantConnectionManager;
	now?: () => Date;
}

export function createStatusRouter(options: StatusRouterOptions): Router {
	const router = express.Router();
	const { cache, connectionManager } = options;
	const now = options.now ?? (() => new Date());

	router.get("/check", (_req, res) => {
		res.send("OK");
	});

	/**
	 * Health endpoint for monitoring and load balancers: 200 while the cache
	 * answers, 503 otherwise.
	 */
	router.get("/health", async (_req, res) => {
		let cacheUp = true;
		try {
			await cache.ping();
		} catch (error) {
			log.warn(error, "Cache health check failed");
			cacheUp = false;
		}
		res.status(cacheUp ? 200 : 503).json({
			status: cacheUp ? "healthy" : "unhealthy",
			timestamp: now().toISOString(),
			checks: { cache: cacheUp ? "up" : "down" },
			openTenantConnections: connectionManager.getCacheSize(),
		});
	});

	return router;
}
