import type { ModelDef } from "../util/ModelDef";
import { DataTypes, type Sequelize } from "sequelize";
import { TENANT_STATUSES, type Tenant, type TenantStatus } from "storefront-common";

export interface NewTenantRow {
	id: string;
	name: string;
	description: string | null;
	status: TenantStatus;
}

/**
 * Define the Tenant model (central database).
 */
export function defineTenants(sequelize: Sequelize): ModelDef<Tenant, NewTenantRow> {
	const existing = sequelize.models?.tenant;
	if (existing) {
		return existing;
	}
	return sequelize.define("tenant", schema, {
		timestamps: true,
		underscored: true,
		tableName: "tenants",
	});
}

const schema = {
	id: {
		type: DataTypes.UUID,
		primaryKey: true,
	},
	name: {
		type: DataTypes.STRING(255),
		allowNull: false,
	},
	description: {
		type: DataTypes.TEXT,
		allowNull: true,
	},
	status: {
		type: DataTypes.ENUM(...TENANT_STATUSES),
		allowNull: false,
		defaultValue: "pending",
	},
};
