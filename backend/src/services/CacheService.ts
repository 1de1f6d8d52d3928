import { getLog } from "../util/Logger";
import { MemoryStore } from "./MemoryStore";
import { Redis } from "ioredis";

const log = getLog(import.meta);

/**
 * Cache operations shared by the Redis client, the in-memory store and
 * tenant-namespaced views of either.
 */
export interface CacheClient {
	get(key: string): Promise<string | null>;
	set(key: string, value: string, expirationSeconds?: number): Promise<"OK">;
	del(...keys: Array<string>): Promise<number>;
	/** Keys matching a pattern with a trailing `*` wildcard */
	keys(pattern: string): Promise<Array<string>>;
	ping(): Promise<string>;
	close(): Promise<void>;
}

export type CacheType = "redis" | "memory";

class RedisCacheClient implements CacheClient {
	constructor(private readonly redis: Redis) {}

	get(key: string): Promise<string | null> {
		return this.redis.get(key);
	}

	async set(key: string, value: string, expirationSeconds?: number): Promise<"OK"> {
		if (expirationSeconds) {
			await this.redis.setex(key, expirationSeconds, value);
		} else {
			await this.redis.set(key, value);
		}
		return "OK";
	}

	del(...keys: Array<string>): Promise<number> {
		if (keys.length === 0) {
			return Promise.resolve(0);
		}
		return this.redis.del(...keys);
	}

	keys(pattern: string): Promise<Array<string>> {
		return this.redis.keys(pattern);
	}

	ping(): Promise<string> {
		return this.redis.ping();
	}

	async close(): Promise<void> {
		await this.redis.quit();
	}
}

/**
 * A view of a cache client whose keys all live under `prefix`. Keys returned
 * by `keys()` have the prefix removed.
 */
export function createNamespacedCache(client: CacheClient, prefix: string): CacheClient {
	const scoped = (key: string) => `${prefix}${key}`;
	return {
		get: key => client.get(scoped(key)),
		set: (key, value, expirationSeconds) => client.set(scoped(key), value, expirationSeconds),
		del: (...keys) => client.del(...keys.map(scoped)),
		keys: async pattern => {
			const keys = await client.keys(scoped(pattern));
			return keys.map(key => key.substring(prefix.length));
		},
		ping: () => client.ping(),
		// The underlying client is shared, so a view never closes it
		close: () => Promise.resolve(),
	};
}

/**
 * Removes every key under a prefix. Returns the number of keys deleted.
 */
export async function purgeNamespace(client: CacheClient, prefix: string): Promise<number> {
	const keys = await client.keys(`${prefix}*`);
	return await client.del(...keys);
}

export interface CacheConnection {
	client: CacheClient;
	type: CacheType;
}

/**
 * Connects to Redis when a URL is given, falling back to the in-memory store
 * when it is absent or unreachable.
 */
export async function createCacheClient(
	redisUrl: string | undefined,
	connect: (url: string) => Promise<Redis> = connectRedis,
): Promise<CacheConnection> {
	if (redisUrl) {
		try {
			const redis = await connect(redisUrl);
			log.info("Using Redis for caching");
			return { client: new RedisCacheClient(redis), type: "redis" };
		} catch (error) {
			log.warn(error, "Failed to connect to Redis, falling back to in-memory storage");
		}
	} else {
		log.info("REDIS_URL not configured, using in-memory storage");
	}
	return { client: new MemoryStore(), type: "memory" };
}

async function connectRedis(url: string): Promise<Redis> {
	const redis = new Redis(url, {
		maxRetriesPerRequest: 3,
		enableReadyCheck: true,
		connectTimeout: 5000,
		lazyConnect: true,
	});
	redis.on("error", error => log.error(error, "Redis connection error"));
	try {
		await redis.connect();
	} catch (error) {
		redis.disconnect();
		throw error;
	}
	return redis;
}
