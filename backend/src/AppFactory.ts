import { type Config, initializeConfig } from "./config/Config";
import { createPermissionMiddleware } from "./middleware/PermissionMiddleware";
import { createPlatformRegistry } from "./platform/Bindings";
import { createPlatformDetector, type PlatformDetector } from "./platform/PlatformDetector";
import { createPlatformMiddleware } from "./platform/PlatformMiddleware";
import type { PlatformRegistry } from "./platform/PlatformRegistry";
import { createAdminRouter } from "./router/AdminRouter";
import { createCentralAuthRouter, createTenantAuthRouter } from "./router/AuthRouter";
import { createRoleRouter } from "./router/RoleRouter";
import { createStatusRouter } from "./router/StatusRouter";
import { PermissionService } from "./services/PermissionService";
import { createTenancyFromConfig, type TenancyInfrastructure } from "./tenant/MultiTenantSetup";
import { getLog } from "./util/Logger";
import { sendError } from "./util/RouterUtil";
import { createTokenUtil, type SessionClaims, SessionClaimsSchema, type TokenUtil } from "./util/TokenUtil";
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import morgan from "morgan";
import type { Server } from "node:http";

const log = getLog(import.meta);

export interface PlatformLayer {
	detector: PlatformDetector;
	registry: PlatformRegistry;
	tokenUtil: TokenUtil<SessionClaims>;
	permissionService: PermissionService;
}

export interface StorefrontApp extends PlatformLayer {
	app: Express;
}

/**
 * The platform detector and the binding table, wired to tenancy. Shared by
 * the HTTP app and the operator CLI.
 */
export function createPlatformLayer(config: Config, tenancy: TenancyInfrastructure): PlatformLayer {
	const tokenUtil = createTokenUtil(SessionClaimsSchema, {
		secret: config.TOKEN_SECRET,
		algorithm: config.TOKEN_ALGORITHM,
		expiresInSeconds: config.TOKEN_EXPIRES_IN_SECONDS,
	});
	const permissionService = new PermissionService();
	const detector = createPlatformDetector({
		versions: config.API_VERSIONS,
		platforms: config.PLATFORMS,
		header: config.PLATFORM_HEADER,
	});
	const registry = createPlatformRegistry(config.API_VERSIONS, {
		baseDomain: config.BASE_DOMAIN,
		directory: tenancy.directory,
		lifecycle: tenancy.lifecycle,
		passwordHasher: tenancy.passwordHasher,
		tokenUtil,
		tokenExpiresInSeconds: config.TOKEN_EXPIRES_IN_SECONDS,
		permissionService,
	});
	return { detector, registry, tokenUtil, permissionService };
}

/**
 * Builds the Express app on top of already-initialised tenancy.
 *
 * Routes under /api/{version} first pass the platform middleware. Central
 * routes (sign-up, platform introspection, admin) are mounted before the
 * tenant middleware; everything after it runs inside the tenant's context.
 */
export function createExpressApp(config: Config, tenancy: TenancyInfrastructure): StorefrontApp {
	log.info("Storefront initializing Express app");

	const layer = createPlatformLayer(config, tenancy);
	const { detector, registry, tokenUtil, permissionService } = layer;
	const permissionMiddleware = createPermissionMiddleware({ tokenUtil, permissionService });

	const app = express();
	app.set("trust proxy", 1);

	app.use(
		morgan(":method :url :status :res[content-length] - :response-time ms", {
			stream: {
				write: (message: string) => {
					log.debug(message.trim());
				},
			},
		}),
	);
	app.use(
		cors({
			origin: config.ORIGIN,
			allowedHeaders: ["Content-Type", "Authorization", config.PLATFORM_HEADER],
		}),
	);
	app.use(express.json({ limit: "1mb" }));

	app.use(
		"/api/status",
		createStatusRouter({ cache: tenancy.cache, connectionManager: tenancy.connectionManager }),
	);

	const api = "/api/:version";
	app.use(api, createPlatformMiddleware({ detector, registry }));

	// Central routes
	app.use(`${api}/auth`, createCentralAuthRouter());
	app.use(`${api}/admin`, createAdminRouter({ lifecycle: tenancy.lifecycle, adminSecret: config.ADMIN_SECRET }));

	// Tenant routes
	const tenantRoutes = express.Router();
	tenantRoutes.use("/auth", createTenantAuthRouter());
	tenantRoutes.use("/roles", createRoleRouter({ permissionMiddleware }));
	app.use(api, tenancy.middleware, tenantRoutes);

	app.use((_req: Request, res: Response) => {
		res.status(404).json({ error: "Not found" });
	});
	// Express recognises error handlers by their four parameters
	app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
		if (error instanceof SyntaxError) {
			res.status(400).json({ error: "Malformed JSON body", code: "invalid_json" });
			return;
		}
		sendError(res, error);
	});

	log.info("Express app created successfully");
	return { app, ...layer };
}

/**
 * Loads configuration, opens the datastores and starts listening. Signals
 * close the server and tenancy before exiting.
 */
export async function createAndStartServer(): Promise<Server> {
	log.info("Storefront starting up on Node %s", process.version);

	const config = initializeConfig();
	const tenancy = await createTenancyFromConfig(config);
	const { app, registry } = createExpressApp(config, tenancy);
	log.debug({ bindings: registry.list() }, "Platform bindings registered");

	const server = app.listen(config.PORT, config.HOST, () => {
		log.info("Storefront listening on %s:%d", config.HOST, config.PORT);
	});

	let stopping = false;
	const signalListener = (signal: NodeJS.Signals) => {
		if (stopping) {
			return;
		}
		stopping = true;
		log.info("Exiting storefront due to signal: %s", signal);
		server.close();
		void tenancy.shutdown().then(
			() => process.exit(0),
			(error: unknown) => {
				log.error(error, "Shutdown failed");
				process.exit(1);
			},
		);
	};
	for (const signal of ["SIGINT", "SIGTERM", "SIGHUP"] as const) {
		process.on(signal, signalListener);
	}

	return server;
}
