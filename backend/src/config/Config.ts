import { createEnv } from "@t3-oss/env-core";
import { config as dotenvConfig } from "dotenv";
import { PLATFORMS } from "storefront-common";
import { z } from "zod";

const BooleanSchema = z
	.string()
	// only allow "true" or "false"
	.refine(s => s === "true" || s === "false")
	.transform(s => s === "true")
	.default("false");

const TrueByDefaultSchema = z
	.string()
	.refine(s => s === "true" || s === "false")
	.transform(s => s === "true")
	.default("true");

function splitList(value: string): Array<string> {
	return value
		.split(",")
		.map(item => item.trim())
		.filter(item => item.length > 0);
}

/** Comma list of API versions; the first is the fallback for console invocations. */
const VersionListSchema = z
	.string()
	.default("v1")
	.transform(splitList)
	.pipe(z.array(z.string().regex(/^[A-Za-z0-9._-]+$/)).min(1));

/** Comma list of enabled platform tags; the first is the fallback for console invocations. */
const PlatformListSchema = z.string().default(PLATFORMS.join(",")).transform(splitList).pipe(z.array(z.enum(PLATFORMS)).min(1));

export const configSchema = {
	server: {
		NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
		HOST: z.string().default("0.0.0.0"),
		PORT: z.coerce.number().int().positive().default(7034),
		ORIGIN: z.string().default("http://localhost:7034"),
		// Merchant storefronts live at {subdomain}.{BASE_DOMAIN}
		BASE_DOMAIN: z.string().default("localhost"),

		API_VERSIONS: VersionListSchema,
		PLATFORMS: PlatformListSchema,
		PLATFORM_HEADER: z
			.string()
			.default("x-platform")
			.transform(s => s.toLowerCase()),

		POSTGRES_DATABASE: z.string().default("storefront"),
		POSTGRES_HOST: z.string().default("localhost"),
		POSTGRES_LOGGING: BooleanSchema,
		POSTGRES_PASSWORD: z.string().default(""),
		POSTGRES_POOL_MAX: z.coerce.number().int().positive().default(5),
		POSTGRES_PORT: z.coerce.number().int().positive().default(5432),
		POSTGRES_SSL: BooleanSchema,
		POSTGRES_USERNAME: z.string().default("postgres"),
		DB_CONNECT_MAX_RETRIES: z.coerce.number().int().nonnegative().default(5),
		DB_CONNECT_RETRY_BASE_DELAY_MS: z.coerce.number().int().positive().default(1000),
		DB_CONNECT_RETRY_MAX_DELAY_MS: z.coerce.number().int().positive().default(10000),

		TENANT_ISOLATION: z.enum(["schema", "database"]).default("schema"),
		TENANT_DATABASE_PREFIX: z
			.string()
			.regex(/^[a-z_][a-z0-9_]*$/)
			.default("tenant_"),
		// Maximum number of tenant connections kept open at once (LRU evicted)
		TENANT_CONNECTION_POOL_MAX: z.coerce.number().int().positive().default(100),
		TENANT_CONNECTION_TTL_MS: z.coerce.number().int().positive().default(30 * 60 * 1000),
		// Pool size of each tenant connection
		TENANT_POOL_MAX: z.coerce.number().int().positive().default(5),
		TENANT_OWNER_ROLE: z.string().min(1).default("merchant_admin"),
		TENANT_SEED_ROLES: TrueByDefaultSchema,
		TENANT_ACTIVATE_ON_PROVISION: TrueByDefaultSchema,
		ROLE_SEED_CONFIG_PATH: z.string().optional(),

		REDIS_URL: z.string().optional(),
		FILE_STORAGE_ROOT: z.string().default("./storage"),

		// Admin routes are disabled unless a secret is configured
		ADMIN_SECRET: z.string().min(8).optional(),
		TOKEN_SECRET: z.string().min(1),
		TOKEN_ALGORITHM: z.enum(["HS256", "HS384", "HS512"]).default("HS256"),
		TOKEN_EXPIRES_IN_SECONDS: z.coerce.number().int().positive().default(2 * 60 * 60),
	},
	runtimeEnv: process.env,
	emptyStringAsUndefined: true,
};

export function createConfig() {
	return createEnv(configSchema);
}

export type Config = ReturnType<typeof createConfig>;

let currentConfig: Config | undefined;

/**
 * Gets the current configuration, parsing process.env on first use.
 */
export function getConfig(): Config {
	if (!currentConfig) {
		currentConfig = createConfig();
	}
	return currentConfig;
}

/**
 * Loads .env files and parses the configuration. Called once at startup.
 */
export function initializeConfig(): Config {
	reloadEnvFiles();
	currentConfig = createConfig();
	return currentConfig;
}

/**
 * Re-parses .env and .env.local, overwriting process.env values.
 * .env.local is loaded last so local overrides take precedence.
 */
export function reloadEnvFiles(): void {
	dotenvConfig({ path: ".env", override: true, quiet: true });
	dotenvConfig({ path: ".env.local", override: true, quiet: true });
}

/**
 * Resets the configuration cache so the next getConfig() re-reads process.env.
 */
export function resetConfig(): void {
	currentConfig = undefined;
}
