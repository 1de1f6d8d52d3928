import type { Config } from "../config/Config";
import { getLog } from "./Logger";
import { withRetry } from "./Retry";
import { Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Connection settings shared by the central datastore and every tenant
 * connection. Tenant connections differ only in the database they open.
 */
export interface PostgresConnection {
	host: string;
	port: number;
	username: string;
	password: string;
	database: string;
	ssl: boolean;
	logging: boolean;
	poolMax: number;
}

export function getPostgresConnection(config: Config): PostgresConnection {
	return {
		host: config.POSTGRES_HOST,
		port: config.POSTGRES_PORT,
		username: config.POSTGRES_USERNAME,
		password: config.POSTGRES_PASSWORD,
		database: config.POSTGRES_DATABASE,
		ssl: config.POSTGRES_SSL,
		logging: config.POSTGRES_LOGGING,
		poolMax: config.POSTGRES_POOL_MAX,
	};
}

function getErrorCode(error: Error): string | undefined {
	const parent: unknown = "parent" in error ? error.parent : undefined;
	if (typeof parent === "object" && parent !== null && "code" in parent && typeof parent.code === "string") {
		return parent.code;
	}
}

/**
 * Formats a database connection error with the address that failed.
 */
function formatConnectionError(error: unknown, host: string, port: number): Error {
	if (error instanceof Error && getErrorCode(error) === "ECONNREFUSED") {
		return new Error(
			[
				`PostgreSQL connection refused at ${host}:${port}`,
				"",
				"Check that PostgreSQL is running and that POSTGRES_HOST and POSTGRES_PORT point at it.",
			].join("\n"),
			{ cause: error },
		);
	}
	const originalMessage = error instanceof Error ? error.message : String(error);
	return new Error(`Failed to connect to PostgreSQL at ${host}:${port}: ${originalMessage}`, { cause: error });
}

/**
 * Determines if a database connection error is transient and worth retrying.
 */
export function isRetryableConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	const errorCode = getErrorCode(error);
	const message = error.message.toLowerCase();

	// Connection refused - server not ready yet
	if (errorCode === "ECONNREFUSED") {
		return true;
	}

	if (errorCode === "ECONNRESET" || errorCode === "ECONNABORTED") {
		return true;
	}

	// DNS resolution failures (transient)
	if (errorCode === "ENOTFOUND" || errorCode === "EAI_AGAIN") {
		return true;
	}

	if (errorCode === "ETIMEDOUT" || message.includes("timeout")) {
		return true;
	}

	// Server still starting up
	if (errorCode === "57P03" || message.includes("the database system is starting up")) {
		return true;
	}

	return false;
}

/**
 * Creates an unauthenticated Sequelize instance. `database` overrides the
 * database named in the connection settings.
 */
export function createPostgresSequelize(connection: PostgresConnection, database = connection.database): Sequelize {
	return new Sequelize({
		dialect: "postgres",
		host: connection.host,
		port: connection.port,
		username: connection.username,
		password: connection.password,
		database,
		dialectOptions: connection.ssl ? { ssl: { rejectUnauthorized: false } } : {},
		logging: connection.logging ? (sql: string) => log.debug(sql) : false,
		pool: { max: connection.poolMax },
		define: { underscored: true },
	});
}

/**
 * Opens the central datastore, retrying transient connection failures.
 */
export async function createCentralSequelize(config: Config): Promise<Sequelize> {
	const connection = getPostgresConnection(config);
	const sequelize = createPostgresSequelize(connection);

	try {
		await withRetry(() => sequelize.authenticate(), {
			maxAttempts: config.DB_CONNECT_MAX_RETRIES + 1,
			baseDelayMs: config.DB_CONNECT_RETRY_BASE_DELAY_MS,
			maxDelayMs: config.DB_CONNECT_RETRY_MAX_DELAY_MS,
			isRetryable: isRetryableConnectionError,
			label: "DB connect",
		});
		log.info("PostgreSQL connection established to %s", connection.database);
	} catch (error) {
		await sequelize.close();
		throw formatConnectionError(error, connection.host, connection.port);
	}

	return sequelize;
}
