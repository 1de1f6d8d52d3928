import type { CacheClient } from "./CacheService";

interface MemoryEntry {
	value: string;
	/** Epoch milliseconds, or null for no expiry */
	expiresAt: number | null;
}

/**
 * In-process CacheClient with TTL support, used when REDIS_URL is unset and
 * in tests. Not shared between processes.
 */
export class MemoryStore implements CacheClient {
	private readonly store = new Map<string, MemoryEntry>();
	private readonly cleanupInterval: ReturnType<typeof setInterval>;

	constructor(private readonly now: () => number = Date.now) {
		this.cleanupInterval = setInterval(() => this.cleanup(), 60_000);
		this.cleanupInterval.unref();
	}

	private isLive(entry: MemoryEntry | undefined): entry is MemoryEntry {
		return entry !== undefined && (entry.expiresAt === null || this.now() < entry.expiresAt);
	}

	get(key: string): Promise<string | null> {
		const entry = this.store.get(key);
		if (!this.isLive(entry)) {
			this.store.delete(key);
			return Promise.resolve(null);
		}
		return Promise.resolve(entry.value);
	}

	set(key: string, value: string, expirationSeconds?: number): Promise<"OK"> {
		const expiresAt = expirationSeconds ? this.now() + expirationSeconds * 1000 : null;
		this.store.set(key, { value, expiresAt });
		return Promise.resolve("OK");
	}

	del(...keys: Array<string>): Promise<number> {
		let deleted = 0;
		for (const key of keys) {
			if (this.store.delete(key)) {
				deleted++;
			}
		}
		return Promise.resolve(deleted);
	}

	/** Only a trailing `*` wildcard is supported. */
	keys(pattern: string): Promise<Array<string>> {
		const prefix = pattern.endsWith("*") ? pattern.slice(0, -1) : undefined;
		const matches: Array<string> = [];
		for (const [key, entry] of this.store) {
			if (!this.isLive(entry)) {
				continue;
			}
			if (prefix === undefined ? key === pattern : key.startsWith(prefix)) {
				matches.push(key);
			}
		}
		return Promise.resolve(matches);
	}

	ping(): Promise<string> {
		return Promise.resolve("PONG");
	}

	close(): Promise<void> {
		clearInterval(this.cleanupInterval);
		this.store.clear();
		return Promise.resolve();
	}

	private cleanup(): void {
		for (const [key, entry] of this.store) {
			if (!this.isLive(entry)) {
				this.store.delete(key);
			}
		}
	}
}
