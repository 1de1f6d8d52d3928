import { type CacheClient, createNamespacedCache, purgeNamespace } from "../services/CacheService";
import { getLog } from "../util/Logger";
import { rm } from "node:fs/promises";
import { join } from "node:path";

const log = getLog(import.meta);

/**
 * Tenant-scoped handles besides the database: a cache view, a file
 * directory and a queue-name prefix, all keyed by tenant.
 */
export interface TenantResources {
	readonly cache: CacheClient;
	readonly cachePrefix: string;
	readonly fileRoot: string;
	queueName(name: string): string;
}

export interface TenantResourceManager {
	forTenant(tenantId: string, databaseName: string): TenantResources;
	/** Deletes the tenant's cached keys and stored files. */
	purge(tenantId: string, databaseName: string): Promise<void>;
}

export interface TenantResourceManagerOptions {
	cache: CacheClient;
	fileStorageRoot: string;
	removeDirectory?: (path: string) => Promise<void>;
}

export function tenantKeyPrefix(tenantId: string): string {
	return `tenant:${tenantId}:`;
}

export function createTenantResourceManager(options: TenantResourceManagerOptions): TenantResourceManager {
	const { cache, fileStorageRoot } = options;
	const removeDirectory = options.removeDirectory ?? (path => rm(path, { recursive: true, force: true }));

	return { forTenant, purge };

	function forTenant(tenantId: string, databaseName: string): TenantResources {
		const prefix = tenantKeyPrefix(tenantId);
		return {
			cache: createNamespacedCache(cache, prefix),
			cachePrefix: prefix,
			fileRoot: join(fileStorageRoot, databaseName),
			queueName: name => `${prefix}${name}`,
		};
	}

	async function purge(tenantId: string, databaseName: string): Promise<void> {
		const purged = await purgeNamespace(cache, tenantKeyPrefix(tenantId));
		const fileRoot = join(fileStorageRoot, databaseName);
		await removeDirectory(fileRoot);
		log.info({ tenantId, purgedKeys: purged, fileRoot }, "Purged tenant cache and files");
	}
}
