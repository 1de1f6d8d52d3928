/**
 * CentralDatabase - DAO factory for the central datastore, which holds the
 * tenant registry and the domain table.
 *
 * @module CentralDatabase
 */

import type { DaoWriteOptions } from "../dao/DaoOptions";
import { createDomainDao, type DomainDao } from "../dao/DomainDao";
import { createTenantDao, type TenantDao } from "../dao/TenantDao";
import { defineDomains } from "../model/Domain";
import { defineTenants } from "../model/Tenant";
import { getLog } from "../util/Logger";
import type { Sequelize } from "sequelize";

const log = getLog(import.meta);

export interface CentralDatabase {
	readonly tenantDao: TenantDao;
	readonly domainDao: DomainDao;
	/**
	 * Runs work in one central transaction. DAO writes given the options join
	 * it; a thrown error rolls all of them back.
	 */
	transaction<T>(work: (options: DaoWriteOptions) => Promise<T>): Promise<T>;
	sync(): Promise<void>;
	close(): Promise<void>;
}

export function createCentralDatabase(sequelize: Sequelize): CentralDatabase {
	log.info("Initializing central database");

	defineTenants(sequelize);
	defineDomains(sequelize);

	return {
		tenantDao: createTenantDao(sequelize),
		domainDao: createDomainDao(sequelize),
		transaction,
		sync,
		close,
	};

	function transaction<T>(work: (options: DaoWriteOptions) => Promise<T>): Promise<T> {
		return sequelize.transaction(t => work({ transaction: t }));
	}

	async function sync(): Promise<void> {
		await sequelize.sync();
		log.info("Central models synced");
	}

	function close(): Promise<void> {
		return sequelize.close();
	}
}
