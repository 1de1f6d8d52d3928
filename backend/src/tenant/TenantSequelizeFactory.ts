/**
 * Factory functions for Sequelize instances bound to one tenant's datastore.
 *
 * ## Isolation strategies
 *
 * - `schema`: every tenant lives in its own Postgres schema inside the central
 *   database. `options.schema` makes Sequelize schema-qualify table names in
 *   generated SQL, and `SET search_path` in afterConnect covers raw queries.
 * - `database`: every tenant owns a separate Postgres database, and the
 *   connection simply opens it.
 *
 * In both cases the name comes from {@link tenantDatabaseName}, so raw SQL that
 * interpolates it only ever sees `[a-z0-9_]`.
 */

import { createPostgresSequelize, type PostgresConnection } from "../util/Sequelize";
import { getLog } from "../util/Logger";
import { type Options, Sequelize } from "sequelize";

const log = getLog(import.meta);

export type TenantIsolation = "schema" | "database";

/** Postgres truncates identifiers longer than this */
const MAX_IDENTIFIER_LENGTH = 63;

const IDENTIFIER_PATTERN = /^[a-z0-9_]+$/;

export function isSafeIdentifier(name: string): boolean {
	return name.length > 0 && name.length <= MAX_IDENTIFIER_LENGTH && IDENTIFIER_PATTERN.test(name);
}

/**
 * Derives the deterministic datastore name of a tenant:
 * `prefix` followed by the tenant id, lowercased, with dashes removed.
 */
export function tenantDatabaseName(tenantId: string, prefix: string): string {
	const name = `${prefix}${tenantId.replaceAll("-", "").toLowerCase()}`;
	if (!isSafeIdentifier(name)) {
		throw new Error(`Tenant id ${tenantId} does not produce a valid datastore name`);
	}
	return name;
}

interface QueryableConnection {
	query(sql: string): Promise<unknown>;
}

function isQueryable(connection: unknown): connection is QueryableConnection {
	return (
		typeof connection === "object" &&
		connection !== null &&
		"query" in connection &&
		typeof connection.query === "function"
	);
}

/**
 * Creates a Sequelize instance for the named tenant datastore.
 */
export function createTenantSequelize(
	connection: PostgresConnection,
	isolation: TenantIsolation,
	name: string,
): Sequelize {
	if (!isSafeIdentifier(name)) {
		throw new Error(`Refusing to connect to unsafe datastore name: ${name}`);
	}

	if (isolation === "database") {
		log.debug("Creating Sequelize for tenant database %s", name);
		return createPostgresSequelize(connection, name);
	}

	log.debug("Creating Sequelize for tenant schema %s", name);
	const options: Options = {
		dialect: "postgres",
		host: connection.host,
		port: connection.port,
		username: connection.username,
		password: connection.password,
		database: connection.database,
		dialectOptions: connection.ssl ? { ssl: { rejectUnauthorized: false } } : {},
		logging: connection.logging ? (sql: string) => log.debug(sql) : false,
		pool: { max: connection.poolMax },
		define: { underscored: true },
		schema: name,
		hooks: {
			afterConnect: async (pgConnection: unknown) => {
				if (isQueryable(pgConnection)) {
					await pgConnection.query(`SET search_path TO "${name}"`);
				}
			},
		},
	};
	return new Sequelize(options);
}
