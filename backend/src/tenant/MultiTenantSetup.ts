import type { Config } from "../config/Config";
import { type CentralDatabase, createCentralDatabase } from "../core/CentralDatabase";
import { type CacheClient, createCacheClient } from "../services/CacheService";
import { getLog } from "../util/Logger";
import { createArgon2Hasher, type PasswordHasher } from "../util/PasswordUtil";
import { createCentralSequelize, getPostgresConnection } from "../util/Sequelize";
import { loadRoleSeedConfig } from "./RoleSeedConfig";
import { createTenantConnectionManager, type TenantConnectionManager } from "./TenantConnectionManager";
import { createTenantContextManager, type TenantContextManager } from "./TenantContextManager";
import { createTenantDatabaseProvisioner, type TenantDatabaseProvisioner } from "./TenantDatabaseProvisioner";
import { createTenantDirectory, type TenantDirectory } from "./TenantDirectory";
import { createTenantLifecycle, type TenantLifecycle } from "./TenantLifecycle";
import { createTenantMiddleware } from "./TenantMiddleware";
import { createTenantResourceManager, type TenantResourceManager } from "./TenantResources";
import type { RequestHandler } from "express";
import type { ManagedTenantStatus, RoleSeedConfig } from "storefront-common";

const log = getLog(import.meta);

/**
 * Multi-tenant infrastructure components.
 */
export interface TenancyInfrastructure {
	central: CentralDatabase;
	directory: TenantDirectory;
	/** Connection manager with LRU caching */
	connectionManager: TenantConnectionManager;
	resourceManager: TenantResourceManager;
	contextManager: TenantContextManager;
	/** Shared cache; tenants see namespaced views of it */
	cache: CacheClient;
	lifecycle: TenantLifecycle;
	passwordHasher: PasswordHasher;
	/** Express middleware that resolves the tenant from the Host header */
	middleware: RequestHandler;
	/** Stops the idle sweep and closes every connection */
	shutdown: () => Promise<void>;
}

/**
 * The already-opened pieces tenancy is assembled from.
 */
export interface TenancyParts {
	central: CentralDatabase;
	provisioner: TenantDatabaseProvisioner;
	connectionManager: TenantConnectionManager;
	cache: CacheClient;
	fileStorageRoot: string;
	passwordHasher: PasswordHasher;
	ownerRole: string;
	provisionedStatus: ManagedTenantStatus;
	loadRoleSeedConfig?: (() => Promise<RoleSeedConfig>) | undefined;
	seedOnProvision?: boolean | undefined;
	removeDirectory?: (path: string) => Promise<void>;
	/** Interval of the idle-connection sweep; 0 disables it (default: 60s) */
	sweepIntervalMs?: number;
}

export function assembleTenancy(parts: TenancyParts): TenancyInfrastructure {
	const { central, provisioner, connectionManager, cache, passwordHasher } = parts;

	const resourceManager = createTenantResourceManager({
		cache,
		fileStorageRoot: parts.fileStorageRoot,
		...(parts.removeDirectory && { removeDirectory: parts.removeDirectory }),
	});
	const directory = createTenantDirectory(central);
	const contextManager = createTenantContextManager({
		tenantDao: central.tenantDao,
		connectionManager,
		resourceManager,
	});
	const lifecycle = createTenantLifecycle({
		central,
		directory,
		provisioner,
		connectionManager,
		contextManager,
		resourceManager,
		passwordHasher,
		ownerRole: parts.ownerRole,
		loadRoleSeedConfig: parts.loadRoleSeedConfig,
		seedOnProvision: parts.seedOnProvision,
		provisionedStatus: parts.provisionedStatus,
	});
	const middleware = createTenantMiddleware({ directory, contextManager });

	const sweepIntervalMs = parts.sweepIntervalMs ?? 60_000;
	let sweep: ReturnType<typeof setInterval> | undefined;
	if (sweepIntervalMs > 0) {
		sweep = setInterval(() => {
			connectionManager.evictExpired().catch((error: unknown) => {
				log.warn(error, "Idle tenant connection sweep failed");
			});
		}, sweepIntervalMs);
		sweep.unref();
	}

	async function shutdown(): Promise<void> {
		log.info("Shutting down multi-tenant infrastructure");
		if (sweep) {
			clearInterval(sweep);
			sweep = undefined;
		}
		await connectionManager.closeAll();
		await cache.close();
		await central.close();
		log.info("Multi-tenant infrastructure shutdown complete");
	}

	log.info("Multi-tenant infrastructure initialized");

	return {
		central,
		directory,
		connectionManager,
		resourceManager,
		contextManager,
		cache,
		lifecycle,
		passwordHasher,
		middleware,
		shutdown,
	};
}

/**
 * Opens the central datastore and the cache named in the configuration and
 * assembles tenancy on top of them.
 */
export async function createTenancyFromConfig(config: Config): Promise<TenancyInfrastructure> {
	log.info("Initializing multi-tenant infrastructure (isolation: %s)", config.TENANT_ISOLATION);

	const sequelize = await createCentralSequelize(config);
	const central = createCentralDatabase(sequelize);
	await central.sync();

	const connection = { ...getPostgresConnection(config), poolMax: config.TENANT_POOL_MAX };
	const connectionManager = createTenantConnectionManager({
		connection,
		isolation: config.TENANT_ISOLATION,
		databasePrefix: config.TENANT_DATABASE_PREFIX,
		maxConnections: config.TENANT_CONNECTION_POOL_MAX,
		ttlMs: config.TENANT_CONNECTION_TTL_MS,
	});
	const { client: cache } = await createCacheClient(config.REDIS_URL);
	const seedPath = config.ROLE_SEED_CONFIG_PATH;

	return assembleTenancy({
		central,
		provisioner: createTenantDatabaseProvisioner(sequelize, config.TENANT_ISOLATION),
		connectionManager,
		cache,
		fileStorageRoot: config.FILE_STORAGE_ROOT,
		passwordHasher: createArgon2Hasher(),
		ownerRole: config.TENANT_OWNER_ROLE,
		provisionedStatus: config.TENANT_ACTIVATE_ON_PROVISION ? "active" : "inactive",
		loadRoleSeedConfig: () => (seedPath ? loadRoleSeedConfig(seedPath) : loadRoleSeedConfig()),
		seedOnProvision: config.TENANT_SEED_ROLES,
	});
}
