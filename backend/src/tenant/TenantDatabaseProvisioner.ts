import { getLog } from "../util/Logger";
import { isSafeIdentifier, type TenantIsolation } from "./TenantSequelizeFactory";
import { QueryTypes, type Sequelize } from "sequelize";

const log = getLog(import.meta);

/**
 * Creates and drops the isolated datastore of a tenant. Runs against the
 * central connection.
 */
export interface TenantDatabaseProvisioner {
	readonly isolation: TenantIsolation;
	/** Fails if the datastore already exists. */
	createDatabase(name: string): Promise<void>;
	/** No-op when the datastore does not exist. */
	dropDatabase(name: string): Promise<void>;
	databaseExists(name: string): Promise<boolean>;
}

function assertSafe(name: string): void {
	if (!isSafeIdentifier(name)) {
		throw new Error(`Refusing to use unsafe datastore name: ${name}`);
	}
}

export function createTenantDatabaseProvisioner(
	sequelize: Sequelize,
	isolation: TenantIsolation,
): TenantDatabaseProvisioner {
	const kind = isolation === "schema" ? "SCHEMA" : "DATABASE";

	return {
		isolation,
		createDatabase,
		dropDatabase,
		databaseExists,
	};

	async function createDatabase(name: string): Promise<void> {
		assertSafe(name);
		await sequelize.query(`CREATE ${kind} "${name}"`);
		log.info("Created tenant %s %s", isolation, name);
	}

	async function dropDatabase(name: string): Promise<void> {
		assertSafe(name);
		// Tables created by migrations go with the schema
		const cascade = isolation === "schema" ? " CASCADE" : "";
		await sequelize.query(`DROP ${kind} IF EXISTS "${name}"${cascade}`);
		log.info("Dropped tenant %s %s", isolation, name);
	}

	async function databaseExists(name: string): Promise<boolean> {
		const sql =
			isolation === "schema"
				? "SELECT 1 AS found FROM information_schema.schemata WHERE schema_name = :name"
				: "SELECT 1 AS found FROM pg_database WHERE datname = :name";
		const rows = await sequelize.query(sql, { replacements: { name }, type: QueryTypes.SELECT });
		return rows.length > 0;
	}
}
