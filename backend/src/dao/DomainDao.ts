import { defineDomains } from "../model/Domain";
import type { DaoWriteOptions } from "./DaoOptions";
import type { Sequelize } from "sequelize";
import type { Domain, NewDomain } from "storefront-common";

/**
 * Domain records in the central database. Lookups are exact matches on the
 * stored string.
 */
export interface DomainDao {
	create(domain: NewDomain, options?: DaoWriteOptions): Promise<Domain>;
	findByDomain(domain: string, options?: DaoWriteOptions): Promise<Domain | undefined>;
	listByTenant(tenantId: string): Promise<Array<Domain>>;
	deleteByTenant(tenantId: string, options?: DaoWriteOptions): Promise<number>;
	count(): Promise<number>;
}

export function createDomainDao(sequelize: Sequelize): DomainDao {
	const Domains = defineDomains(sequelize);

	return {
		create,
		findByDomain,
		listByTenant,
		deleteByTenant,
		count,
	};

	async function create(domain: NewDomain, options: DaoWriteOptions = {}): Promise<Domain> {
		const created = await Domains.create(domain, { transaction: options.transaction });
		return created.get({ plain: true });
	}

	async function findByDomain(domain: string, options: DaoWriteOptions = {}): Promise<Domain | undefined> {
		const found = await Domains.findOne({ where: { domain }, transaction: options.transaction });
		return found ? found.get({ plain: true }) : undefined;
	}

	async function listByTenant(tenantId: string): Promise<Array<Domain>> {
		const domains = await Domains.findAll({ where: { tenantId }, order: [["id", "ASC"]] });
		return domains.map(d => d.get({ plain: true }));
	}

	function deleteByTenant(tenantId: string, options: DaoWriteOptions = {}): Promise<number> {
		return Domains.destroy({ where: { tenantId }, transaction: options.transaction });
	}

	function count(): Promise<number> {
		return Domains.count();
	}
}
