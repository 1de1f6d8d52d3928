import { defineTenants } from "../model/Tenant";
import type { DaoWriteOptions } from "./DaoOptions";
import { randomUUID } from "node:crypto";
import type { Sequelize } from "sequelize";
import type { NewTenant, Tenant, TenantStatus } from "storefront-common";

/**
 * Tenant records in the central database.
 */
export interface TenantDao {
	create(tenant: NewTenant, options?: DaoWriteOptions): Promise<Tenant>;
	findById(id: string): Promise<Tenant | undefined>;
	listAll(): Promise<Array<Tenant>>;
	listByStatus(status: TenantStatus): Promise<Array<Tenant>>;
	updateStatus(id: string, status: TenantStatus, options?: DaoWriteOptions): Promise<Tenant | undefined>;
	delete(id: string, options?: DaoWriteOptions): Promise<boolean>;
	count(): Promise<number>;
}

export function createTenantDao(sequelize: Sequelize, generateId: () => string = randomUUID): TenantDao {
	const Tenants = defineTenants(sequelize);

	return {
		create,
		findById,
		listAll,
		listByStatus,
		updateStatus,
		delete: deleteTenant,
		count,
	};

	async function create(tenant: NewTenant, options: DaoWriteOptions = {}): Promise<Tenant> {
		const created = await Tenants.create(
			{
				id: generateId(),
				name: tenant.name,
				description: tenant.description,
				status: tenant.status ?? "pending",
			},
			{ transaction: options.transaction },
		);
		return created.get({ plain: true });
	}

	async function findById(id: string): Promise<Tenant | undefined> {
		const tenant = await Tenants.findByPk(id);
		return tenant ? tenant.get({ plain: true }) : undefined;
	}

	async function listAll(): Promise<Array<Tenant>> {
		const tenants = await Tenants.findAll({ order: [["createdAt", "ASC"]] });
		return tenants.map(t => t.get({ plain: true }));
	}

	async function listByStatus(status: TenantStatus): Promise<Array<Tenant>> {
		const tenants = await Tenants.findAll({ where: { status }, order: [["createdAt", "ASC"]] });
		return tenants.map(t => t.get({ plain: true }));
	}

	async function updateStatus(
		id: string,
		status: TenantStatus,
		options: DaoWriteOptions = {},
	): Promise<Tenant | undefined> {
		const [count] = await Tenants.update({ status }, { where: { id }, transaction: options.transaction });
		if (count === 0) {
			return;
		}
		const tenant = await Tenants.findByPk(id, { transaction: options.transaction });
		return tenant ? tenant.get({ plain: true }) : undefined;
	}

	async function deleteTenant(id: string, options: DaoWriteOptions = {}): Promise<boolean> {
		const count = await Tenants.destroy({ where: { id }, transaction: options.transaction });
		return count > 0;
	}

	function count(): Promise<number> {
		return Tenants.count();
	}
}
