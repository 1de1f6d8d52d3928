/**
 * TenantConnectionManager - pooled connections to tenant datastores.
 *
 * ## Connection Pooling
 *
 * Connections are cached by tenant id with LRU eviction:
 * - Each tenant gets its own Sequelize instance bound to its schema or database
 * - Connections are reused across units of work for the same tenant
 * - LRU eviction closes the least-recently-used connection when at capacity
 * - TTL-based expiration closes idle connections
 *
 * Concurrent requests for the same tenant share one initialization promise, so
 * only one connection is ever opened per tenant.
 *
 * @module TenantConnectionManager
 */

import { createTenantDatabase, type TenantDatabase } from "../core/TenantDatabase";
import { getLog } from "../util/Logger";
import { withRetry } from "../util/Retry";
import { isRetryableConnectionError, type PostgresConnection } from "../util/Sequelize";
import { createTenantSequelize, type TenantIsolation, tenantDatabaseName } from "./TenantSequelizeFactory";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

interface ReadyEntry {
	readonly state: "ready";
	readonly sequelize: Sequelize;
	readonly database: TenantDatabase;
	lastUsed: number;
}

interface InitializingEntry {
	readonly state: "initializing";
	readonly promise: Promise<ReadyEntry>;
	lastUsed: number;
}

type CacheEntry = ReadyEntry | InitializingEntry;

export interface TenantConnectionManager {
	/** Name of the tenant's isolated schema or database. */
	databaseNameFor(tenantId: string): string;
	/**
	 * Get or open the connection to the tenant's datastore. The datastore must
	 * already exist.
	 */
	getConnection(tenantId: string): Promise<TenantDatabase>;
	/** Remove the tenant's connection from the cache and close it. */
	evictConnection(tenantId: string): Promise<void>;
	closeAll(): Promise<void>;
	getCacheSize(): number;
	/** Close connections idle for longer than the TTL. */
	evictExpired(): Promise<void>;
}

export interface TenantConnectionManagerConfig {
	connection: PostgresConnection;
	isolation: TenantIsolation;
	databasePrefix: string;
	/** Maximum number of cached connections (default: 100) */
	maxConnections?: number | undefined;
	/** Idle time before a connection is closed (default: 30 minutes) */
	ttlMs?: number | undefined;
	/** Attempts for the first authenticate() of a connection (default: 3) */
	connectAttempts?: number | undefined;
	now?: () => number;
	createSequelizeFn?: (name: string) => Sequelize;
	createDatabaseFn?: (sequelize: Sequelize) => TenantDatabase;
}

export function createTenantConnectionManager(config: TenantConnectionManagerConfig): TenantConnectionManager {
	const maxConnections = config.maxConnections ?? 100;
	const ttlMs = config.ttlMs ?? 30 * 60 * 1000;
	const connectAttempts = config.connectAttempts ?? 3;
	const now = config.now ?? Date.now;
	const createSequelizeFn =
		config.createSequelizeFn ?? ((name: string) => createTenantSequelize(config.connection, config.isolation, name));
	const createDatabaseFn = config.createDatabaseFn ?? createTenantDatabase;

	const cache = new Map<string, CacheEntry>();

	return {
		databaseNameFor,
		getConnection,
		evictConnection,
		closeAll,
		getCacheSize,
		evictExpired,
	};

	function databaseNameFor(tenantId: string): string {
		return tenantDatabaseName(tenantId, config.databasePrefix);
	}

	async function closeEntry(tenantId: string, entry: CacheEntry): Promise<void> {
		try {
			const ready = entry.state === "ready" ? entry : await entry.promise;
			await ready.sequelize.close();
			log.debug("Closed connection for tenant %s", tenantId);
		} catch (err) {
			log.warn(err, "Error closing connection for tenant %s", tenantId);
		}
	}

	function evictLRU(): void {
		if (cache.size < maxConnections) {
			return;
		}

		let oldestKey: string | undefined;
		let oldestTime = Number.POSITIVE_INFINITY;
		for (const [key, entry] of cache.entries()) {
			if (entry.state === "ready" && entry.lastUsed < oldestTime) {
				oldestTime = entry.lastUsed;
				oldestKey = key;
			}
		}

		if (oldestKey) {
			const entry = cache.get(oldestKey);
			cache.delete(oldestKey);
			if (entry) {
				log.info("LRU eviction for tenant connection %s", oldestKey);
				void closeEntry(oldestKey, entry);
			}
		}
	}

	async function openConnection(tenantId: string): Promise<ReadyEntry> {
		const name = databaseNameFor(tenantId);
		const sequelize = createSequelizeFn(name);
		try {
			await withRetry(() => sequelize.authenticate(), {
				maxAttempts: connectAttempts,
				isRetryable: isRetryableConnectionError,
				label: `tenant connect ${name}`,
			});
		} catch (error) {
			await sequelize.close();
			throw error;
		}
		const database = createDatabaseFn(sequelize);
		log.info("Opened connection for tenant %s (%s %s)", tenantId, config.isolation, name);
		return { state: "ready", sequelize, database, lastUsed: now() };
	}

	async function getConnection(tenantId: string): Promise<TenantDatabase> {
		const existing = cache.get(tenantId);
		if (existing) {
			existing.lastUsed = now();
			if (existing.state === "initializing") {
				log.debug("Waiting for initializing connection for tenant %s", tenantId);
				return (await existing.promise).database;
			}
			return existing.database;
		}

		evictLRU();

		const promise = openConnection(tenantId);
		const initializing: InitializingEntry = { state: "initializing", promise, lastUsed: now() };
		cache.set(tenantId, initializing);

		try {
			const ready = await promise;
			// Only replace our own placeholder; an eviction in the meantime wins
			if (cache.get(tenantId) === initializing) {
				cache.set(tenantId, ready);
			}
			return ready.database;
		} catch (error) {
			if (cache.get(tenantId) === initializing) {
				cache.delete(tenantId);
			}
			throw error;
		}
	}

	async function evictConnection(tenantId: string): Promise<void> {
		const entry = cache.get(tenantId);
		if (!entry) {
			return;
		}
		cache.delete(tenantId);
		await closeEntry(tenantId, entry);
		log.info("Evicted connection for tenant %s", tenantId);
	}

	async function closeAll(): Promise<void> {
		log.info("Closing all %d cached tenant connections", cache.size);
		const entries = [...cache.entries()];
		cache.clear();
		await Promise.all(entries.map(([tenantId, entry]) => closeEntry(tenantId, entry)));
	}

	function getCacheSize(): number {
		return cache.size;
	}

	async function evictExpired(): Promise<void> {
		const cutoff = now() - ttlMs;
		const expired = [...cache.entries()].filter(([, entry]) => entry.state === "ready" && entry.lastUsed < cutoff);
		if (expired.length === 0) {
			return;
		}
		log.info("Evicting %d expired tenant connections", expired.length);
		for (const [tenantId, entry] of expired) {
			cache.delete(tenantId);
			await closeEntry(tenantId, entry);
		}
	}
}
