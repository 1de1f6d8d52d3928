import type { CentralDatabase } from "../core/CentralDatabase";
import type { DaoWriteOptions } from "../dao/DaoOptions";
import { getLog } from "../util/Logger";
import { DuplicateDomainError, TenantNotFoundError } from "./TenantErrors";
import { UniqueConstraintError } from "sequelize";
import type { Domain, Tenant } from "storefront-common";

const log = getLog(import.meta);

/**
 * Maps domain strings to tenants in the central datastore. Domains are
 * compared exactly as stored.
 */
export interface TenantDirectory {
	isDomainUnique(domain: string, options?: DaoWriteOptions): Promise<boolean>;
	/** Throws TenantNotFoundError for an unregistered domain. */
	resolveTenant(domain: string): Promise<string>;
	findTenantByDomain(domain: string): Promise<Tenant | undefined>;
	/**
	 * Binds the domain to the tenant. Throws DuplicateDomainError, leaving the
	 * directory untouched, when the domain is already registered.
	 */
	registerDomain(domain: string, tenantId: string, options?: DaoWriteOptions): Promise<Domain>;
	listDomains(tenantId: string): Promise<Array<string>>;
	removeDomains(tenantId: string, options?: DaoWriteOptions): Promise<number>;
}

export function createTenantDirectory(central: CentralDatabase): TenantDirectory {
	const { tenantDao, domainDao } = central;

	return {
		isDomainUnique,
		resolveTenant,
		findTenantByDomain,
		registerDomain,
		listDomains,
		removeDomains,
	};

	async function isDomainUnique(domain: string, options?: DaoWriteOptions): Promise<boolean> {
		return (await domainDao.findByDomain(domain, options)) === undefined;
	}

	async function resolveTenant(domain: string): Promise<string> {
		const found = await domainDao.findByDomain(domain);
		if (!found) {
			throw new TenantNotFoundError(`No tenant is registered for ${domain}`);
		}
		return found.tenantId;
	}

	async function findTenantByDomain(domain: string): Promise<Tenant | undefined> {
		const found = await domainDao.findByDomain(domain);
		return found ? tenantDao.findById(found.tenantId) : undefined;
	}

	async function registerDomain(domain: string, tenantId: string, options?: DaoWriteOptions): Promise<Domain> {
		if (!(await isDomainUnique(domain, options))) {
			throw new DuplicateDomainError(domain);
		}
		try {
			const created = await domainDao.create({ domain, tenantId }, options);
			log.info({ domain, tenantId }, "Registered domain %s", domain);
			return created;
		} catch (error) {
			// A concurrent signup claimed the domain between the check and the insert
			if (error instanceof UniqueConstraintError) {
				throw new DuplicateDomainError(domain);
			}
			throw error;
		}
	}

	async function listDomains(tenantId: string): Promise<Array<string>> {
		const domains = await domainDao.listByTenant(tenantId);
		return domains.map(d => d.domain);
	}

	function removeDomains(tenantId: string, options?: DaoWriteOptions): Promise<number> {
		return domainDao.deleteByTenant(tenantId, options);
	}
}
